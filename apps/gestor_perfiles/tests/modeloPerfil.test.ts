// Pruebas del esquema Mongoose de `profiles` (sin servidor: solo validacion local).
import mongoose from 'mongoose';
import { describe, expect, it } from 'vitest';
import {
  CLAVE_DISCRIMINADOR,
  COLECCION_PERFILES,
  PerfilSchema,
  obtenerModelosPerfil
} from '../src/modulos/modulo_perfiles/modeloPerfil';

const base = {
  email: ' A@X.COM ',
  username: ' alice ',
  password: 'hash',
  name: 'Alice',
  lastname: 'Lopez'
};

describe('modeloPerfil', () => {
  const conexion = mongoose.createConnection();
  const { Perfil, Usuario, Administrador } = obtenerModelosPerfil(conexion);

  it('usa la coleccion profiles con discriminador type', () => {
    expect(PerfilSchema.get('collection')).toBe(COLECCION_PERFILES);
    expect(PerfilSchema.get('discriminatorKey')).toBe(CLAVE_DISCRIMINADOR);
    expect(Usuario.modelName).toBe('User');
    expect(Administrador.modelName).toBe('Admin');
  });

  it('declara indices unicos para email y username', () => {
    expect(PerfilSchema.indexes()).toEqual(
      expect.arrayContaining([
        [{ email: 1 }, expect.objectContaining({ unique: true })],
        [{ username: 1 }, expect.objectContaining({ unique: true })]
      ])
    );
  });

  it('cachea los modelos por conexion', () => {
    expect(obtenerModelosPerfil(conexion).Perfil).toBe(Perfil);
  });

  it('escribe el discriminador y normaliza correo y usuario', () => {
    const usuario = new Usuario({ ...base, gender: 'MALE' });

    expect(usuario.validateSync() ?? null).toBeNull();
    expect(usuario.get('type')).toBe('User');
    expect(usuario.email).toBe('a@x.com');
    expect(usuario.username).toBe('alice');
    expect(usuario.card).toBe('');
    expect(usuario.telephone).toBe('');
  });

  it('exige un genero valido para usuarios', () => {
    expect(new Usuario(base).validateSync()?.errors.gender).toBeDefined();
    expect(new Usuario({ ...base, gender: 'X' }).validateSync()?.errors.gender).toBeDefined();
  });

  it('los administradores no llevan genero', () => {
    const admin = new Administrador({ ...base, currentAccount: 'ES00-0001' });

    expect(admin.validateSync() ?? null).toBeNull();
    expect(admin.get('type')).toBe('Admin');
    expect(admin.currentAccount).toBe('ES00-0001');
  });

  it('exige los campos comunes', () => {
    const errores = new Administrador({}).validateSync()?.errors ?? {};

    expect(Object.keys(errores).sort()).toEqual(['email', 'lastname', 'name', 'password', 'username']);
  });
});
