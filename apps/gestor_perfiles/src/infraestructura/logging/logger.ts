/**
 * logger
 *
 * Logging estructurado (una linea JSON por evento) para el gestor de perfiles.
 * Nunca recibe contrasenas ni hashes: los llamadores solo pasan ids y campos publicos.
 */
export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

type Meta = Record<string, unknown>;
type NivelEstandar = 'info' | 'warn' | 'error';

const servicio = 'gestor-perfiles';

const PRIORIDAD: Record<NivelEstandar | 'silencio', number> = {
  info: 0,
  warn: 1,
  error: 2,
  silencio: 3
};

function serializarError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return { value: String(error) };
}

function nivelEstandar(level: NivelLog): NivelEstandar {
  if (level === 'warn') return 'warn';
  if (level === 'error') return 'error';
  return 'info';
}

// Se lee en cada llamada para que la vista de consola (y las pruebas) puedan ajustarlo.
function nivelMinimo(): number {
  const raw = String(process.env.LOG_NIVEL ?? 'info').trim().toLowerCase();
  if (raw === 'warn' || raw === 'error' || raw === 'silencio') return PRIORIDAD[raw];
  return PRIORIDAD.info;
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  const levelStd = nivelEstandar(level);
  if (PRIORIDAD[levelStd] < nivelMinimo()) return;

  const entry = {
    timestamp: new Date().toISOString(),
    service: servicio,
    env: process.env.NODE_ENV ?? 'development',
    level: levelStd,
    message: msg,
    ...meta
  };

  const line = JSON.stringify(entry);
  if (levelStd === 'error') console.error(line);
  else if (levelStd === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}
