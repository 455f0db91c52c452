// Pruebas de conversion documento <-> perfil.
import { Types } from 'mongoose';
import { describe, expect, it } from 'vitest';
import { ErrorAplicacion } from '../src/compartido/errores/errorAplicacion';
import {
  aPerfil,
  aUsuario,
  documentoDeAdministrador,
  documentoDeUsuario,
  leerHashContrasena
} from '../src/modulos/modulo_perfiles/mapeoPerfil';

const ID = '65f0a1b2c3d4e5f6a7b8c9d0';

function documentoUsuario(cambios: Record<string, unknown> = {}) {
  return {
    _id: ID,
    type: 'User',
    email: 'a@x.com',
    username: 'alice',
    password: 'hash',
    name: 'Alice',
    lastname: 'Lopez',
    telephone: '600111222',
    gender: 'FEMALE',
    card: '4000',
    ...cambios
  };
}

function capturar(fn: () => unknown): ErrorAplicacion {
  try {
    fn();
  } catch (error) {
    if (error instanceof ErrorAplicacion) return error;
    throw error;
  }
  throw new Error('Se esperaba un ErrorAplicacion');
}

describe('mapeoPerfil', () => {
  it('convierte un documento User sin exponer la contrasena', () => {
    expect(aPerfil(documentoUsuario())).toEqual({
      tipo: 'User',
      id: ID,
      correo: 'a@x.com',
      nombreUsuario: 'alice',
      nombre: 'Alice',
      apellido: 'Lopez',
      telefono: '600111222',
      genero: 'FEMALE',
      tarjeta: '4000'
    });
  });

  it('acepta _id como ObjectId y lo devuelve en hexadecimal', () => {
    const usuario = aUsuario(documentoUsuario({ _id: new Types.ObjectId(ID) }));

    expect(usuario.id).toBe(ID);
  });

  it('trata telefono y tarjeta ausentes como texto vacio', () => {
    const usuario = aUsuario(documentoUsuario({ telephone: undefined, card: null }));

    expect(usuario.telefono).toBe('');
    expect(usuario.tarjeta).toBe('');
  });

  it('convierte un documento Admin', () => {
    const perfil = aPerfil({
      _id: ID,
      type: 'Admin',
      email: 'root@x.com',
      username: 'root',
      password: 'hash',
      name: 'Rosa',
      lastname: 'Admin',
      telephone: '',
      currentAccount: 'ES00-0001'
    });

    expect(perfil).toEqual({
      tipo: 'Admin',
      id: ID,
      correo: 'root@x.com',
      nombreUsuario: 'root',
      nombre: 'Rosa',
      apellido: 'Admin',
      telefono: '',
      cuentaActual: 'ES00-0001'
    });
  });

  it('un tipo desconocido es VARIANTE_DESCONOCIDA', () => {
    const error = capturar(() => aPerfil(documentoUsuario({ type: 'Guest' })));

    expect(error.codigo).toBe('VARIANTE_DESCONOCIDA');
    expect(error.detalles).toEqual({ tipo: 'Guest' });
  });

  it('un documento sin tipo tambien es VARIANTE_DESCONOCIDA', () => {
    const { type: _omitido, ...sinTipo } = documentoUsuario();

    expect(capturar(() => aPerfil(sinTipo)).detalles).toEqual({ tipo: 'undefined' });
  });

  it('un documento incompleto es DOCUMENTO_INVALIDO', () => {
    expect(capturar(() => aPerfil(documentoUsuario({ gender: 'X' }))).codigo).toBe('DOCUMENTO_INVALIDO');
    expect(capturar(() => aPerfil(null)).codigo).toBe('DOCUMENTO_INVALIDO');
    expect(capturar(() => leerHashContrasena({})).codigo).toBe('DOCUMENTO_INVALIDO');
  });

  it('lee el hash guardado', () => {
    expect(leerHashContrasena(documentoUsuario())).toBe('hash');
  });

  it('escribe los nombres de campo persistidos', () => {
    expect(
      documentoDeUsuario(
        {
          correo: 'a@x.com',
          nombreUsuario: 'alice',
          nombre: 'Alice',
          apellido: 'Lopez',
          telefono: '',
          genero: 'OTHER',
          tarjeta: ''
        },
        'hash'
      )
    ).toEqual({
      type: 'User',
      email: 'a@x.com',
      username: 'alice',
      password: 'hash',
      name: 'Alice',
      lastname: 'Lopez',
      telephone: '',
      gender: 'OTHER',
      card: ''
    });

    expect(
      documentoDeAdministrador(
        { correo: 'r@x.com', nombreUsuario: 'r', nombre: 'R', apellido: 'A', telefono: '1', cuentaActual: 'C' },
        'hash'
      )
    ).toEqual({
      type: 'Admin',
      email: 'r@x.com',
      username: 'r',
      password: 'hash',
      name: 'R',
      lastname: 'A',
      telephone: '1',
      currentAccount: 'C'
    });
  });
});
