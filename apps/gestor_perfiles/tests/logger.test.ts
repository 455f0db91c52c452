// Pruebas del logger estructurado.
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { log, logError } from '../src/infraestructura/logging/logger';

function ultimaLinea(espia: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const llamada = espia.mock.calls.at(-1);
  return JSON.parse(String(llamada?.[0]));
}

describe('logger', () => {
  const nivelOriginal = process.env.LOG_NIVEL;

  beforeEach(() => {
    process.env.LOG_NIVEL = 'info';
  });

  afterEach(() => {
    process.env.LOG_NIVEL = nivelOriginal;
  });

  it('escribe una linea JSON con servicio, entorno y meta', () => {
    const espia = vi.spyOn(console, 'log').mockImplementation(() => {});

    log('ok', 'Usuario registrado', { perfilId: 'abc' });

    expect(espia).toHaveBeenCalledTimes(1);
    expect(ultimaLinea(espia)).toEqual({
      timestamp: expect.any(String),
      service: 'gestor-perfiles',
      env: 'test',
      level: 'info',
      message: 'Usuario registrado',
      perfilId: 'abc'
    });
  });

  it('envia warn y error a su salida', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    log('warn', 'aviso');
    logError('fallo', new TypeError('roto'), { codigo: 'FALLO_CONSULTA' });

    expect(ultimaLinea(warn)).toMatchObject({ level: 'warn', message: 'aviso' });
    expect(ultimaLinea(error)).toMatchObject({
      level: 'error',
      message: 'fallo',
      codigo: 'FALLO_CONSULTA',
      error: { name: 'TypeError', message: 'roto' }
    });
  });

  it('serializa valores que no son Error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError('fallo', 'texto');

    expect(ultimaLinea(error).error).toEqual({ value: 'texto' });
  });

  it('respeta el nivel minimo', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    process.env.LOG_NIVEL = 'warn';

    log('system', 'descartado');
    log('warn', 'visible');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('silencio descarta incluso los errores', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    process.env.LOG_NIVEL = 'silencio';

    logError('fallo', new Error('x'));

    expect(error).not.toHaveBeenCalled();
  });
});
