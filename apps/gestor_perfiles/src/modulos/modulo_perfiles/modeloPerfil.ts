/**
 * Modelos Mongoose de la coleccion `profiles`.
 *
 * Una sola coleccion guarda usuarios y administradores; mongoose escribe el
 * discriminador `type` ("User" | "Admin") al crear cada documento.
 *
 * Los modelos se registran sobre la conexion del pool (no sobre la conexion
 * global de mongoose) y se cachean por conexion.
 */
import { Schema, type Connection, type Model } from 'mongoose';
import { GENEROS, type Genero } from './tiposPerfil';

export const COLECCION_PERFILES = 'profiles';
export const CLAVE_DISCRIMINADOR = 'type';

export interface DocumentoPerfil {
  email: string;
  username: string;
  password: string;
  name: string;
  lastname: string;
  telephone: string;
}

export interface DocumentoUsuario extends DocumentoPerfil {
  gender: Genero;
  card: string;
}

export interface DocumentoAdministrador extends DocumentoPerfil {
  currentAccount: string;
}

export const PerfilSchema = new Schema<DocumentoPerfil>(
  {
    // unique: el indice es la garantia final contra registros concurrentes.
    email: { type: String, required: true, unique: true, trim: true, lowercase: true },
    username: { type: String, required: true, unique: true, trim: true },
    password: { type: String, required: true },
    name: { type: String, required: true, trim: true },
    lastname: { type: String, required: true, trim: true },
    telephone: { type: String, default: '' }
  },
  { timestamps: true, collection: COLECCION_PERFILES, discriminatorKey: CLAVE_DISCRIMINADOR }
);

export const UsuarioSchema = new Schema<DocumentoUsuario>({
  gender: { type: String, enum: [...GENEROS], required: true },
  card: { type: String, default: '' }
});

export const AdministradorSchema = new Schema<DocumentoAdministrador>({
  currentAccount: { type: String, default: '' }
});

export interface ModelosPerfil {
  Perfil: Model<DocumentoPerfil>;
  Usuario: Model<DocumentoUsuario>;
  Administrador: Model<DocumentoAdministrador>;
}

const modelosPorConexion = new WeakMap<Connection, ModelosPerfil>();

export function obtenerModelosPerfil(conexion: Connection): ModelosPerfil {
  const existentes = modelosPorConexion.get(conexion);
  if (existentes) return existentes;

  const Perfil = conexion.model<DocumentoPerfil>('Perfil', PerfilSchema);
  const modelos: ModelosPerfil = {
    Perfil,
    Usuario: Perfil.discriminator<DocumentoUsuario>('User', UsuarioSchema),
    Administrador: Perfil.discriminator<DocumentoAdministrador>('Admin', AdministradorSchema)
  };
  modelosPorConexion.set(conexion, modelos);
  return modelos;
}
