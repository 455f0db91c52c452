// Pruebas de la semilla del administrador inicial.
import { beforeEach, describe, expect, it } from 'vitest';
import type { SemillaAdministrador } from '../src/configuracion';
import { AlmacenPerfiles } from '../src/modulos/modulo_perfiles/almacenPerfiles';
import { sembrarAdministrador } from '../src/modulos/modulo_perfiles/sembrarAdministrador';
import { SesionPerfil } from '../src/modulos/modulo_perfiles/sesionPerfil';
import { ColeccionPerfilesMemoria } from './utils/coleccionMemoria';

const semilla: SemillaAdministrador = {
  correo: 'root@x.com',
  nombreUsuario: 'root',
  contrasena: 'test-secret',
  nombre: 'Rosa',
  apellido: 'Admin',
  cuentaActual: 'ES00-0001',
  forzar: false
};

describe('sembrarAdministrador', () => {
  let coleccion: ColeccionPerfilesMemoria;
  let almacen: AlmacenPerfiles;

  beforeEach(() => {
    coleccion = new ColeccionPerfilesMemoria();
    almacen = new AlmacenPerfiles(coleccion, new SesionPerfil());
  });

  it('crea el administrador y permite iniciar sesion con el', async () => {
    await expect(sembrarAdministrador({ entorno: 'test', semillaAdmin: semilla }, almacen, coleccion)).resolves.toBe(
      'creado'
    );

    const perfil = await almacen.iniciarSesion('root', 'test-secret');
    expect(perfil).toMatchObject({ tipo: 'Admin', cuentaActual: 'ES00-0001', telefono: '' });
  });

  it('no duplica un administrador existente', async () => {
    await sembrarAdministrador({ entorno: 'test', semillaAdmin: semilla }, almacen, coleccion);

    await expect(sembrarAdministrador({ entorno: 'test', semillaAdmin: semilla }, almacen, coleccion)).resolves.toBe(
      'existente'
    );
    expect(coleccion.documentos).toHaveLength(1);
  });

  it('se omite sin semilla o en produccion sin forzar', async () => {
    await expect(sembrarAdministrador({ entorno: 'test', semillaAdmin: null }, almacen, coleccion)).resolves.toBe(
      'omitido'
    );
    await expect(
      sembrarAdministrador({ entorno: 'production', semillaAdmin: semilla }, almacen, coleccion)
    ).resolves.toBe('omitido');
    expect(coleccion.documentos).toHaveLength(0);
  });

  it('en produccion se crea si se fuerza', async () => {
    await expect(
      sembrarAdministrador({ entorno: 'production', semillaAdmin: { ...semilla, forzar: true } }, almacen, coleccion)
    ).resolves.toBe('creado');
  });

  it('rechaza una semilla con correo invalido', async () => {
    await expect(
      sembrarAdministrador({ entorno: 'test', semillaAdmin: { ...semilla, correo: 'root' } }, almacen, coleccion)
    ).rejects.toMatchObject({ codigo: 'VALIDACION' });
  });
});
