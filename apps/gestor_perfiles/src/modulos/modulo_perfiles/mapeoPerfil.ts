/**
 * Conversion entre documentos de `profiles` y perfiles de dominio.
 *
 * Los documentos llegan crudos (lean) y se validan con Zod antes de confiar
 * en ellos. El tipo se resuelve por el discriminador `type`; un valor que no
 * sea "User" ni "Admin" es un error explicito, nunca un perfil vacio.
 */
import { Types } from 'mongoose';
import { z } from 'zod';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { MENSAJES_ERROR } from '../../compartido/errores/mensajesError';
import type { DocumentoNuevo } from './coleccionPerfiles';
import { GENEROS, type Administrador, type Perfil, type Usuario } from './tiposPerfil';

const esquemaId = z.union([z.string(), z.instanceof(Types.ObjectId)]).transform((valor) => String(valor));

const esquemaDocumentoBase = z.object({
  _id: esquemaId,
  email: z.string(),
  username: z.string(),
  password: z.string(),
  name: z.string(),
  lastname: z.string(),
  telephone: z.string().nullish().transform((valor) => valor ?? '')
});

const esquemaDocumentoUsuario = esquemaDocumentoBase.extend({
  type: z.literal('User'),
  gender: z.enum(GENEROS),
  card: z.string().nullish().transform((valor) => valor ?? '')
});

const esquemaDocumentoAdministrador = esquemaDocumentoBase.extend({
  type: z.literal('Admin'),
  currentAccount: z.string().nullish().transform((valor) => valor ?? '')
});

const esquemaTipo = z.object({ type: z.unknown() });
const esquemaHash = z.object({ password: z.string() });

function documentoInvalido(error: z.ZodError): ErrorAplicacion {
  return new ErrorAplicacion('DOCUMENTO_INVALIDO', MENSAJES_ERROR.DOCUMENTO_INVALIDO, error.flatten());
}

export function leerHashContrasena(documento: unknown): string {
  const resultado = esquemaHash.safeParse(documento);
  if (!resultado.success) throw documentoInvalido(resultado.error);
  return resultado.data.password;
}

export function aUsuario(documento: unknown): Usuario {
  const resultado = esquemaDocumentoUsuario.safeParse(documento);
  if (!resultado.success) throw documentoInvalido(resultado.error);
  const doc = resultado.data;
  return {
    tipo: 'User',
    id: doc._id,
    correo: doc.email,
    nombreUsuario: doc.username,
    nombre: doc.name,
    apellido: doc.lastname,
    telefono: doc.telephone,
    genero: doc.gender,
    tarjeta: doc.card
  };
}

export function aAdministrador(documento: unknown): Administrador {
  const resultado = esquemaDocumentoAdministrador.safeParse(documento);
  if (!resultado.success) throw documentoInvalido(resultado.error);
  const doc = resultado.data;
  return {
    tipo: 'Admin',
    id: doc._id,
    correo: doc.email,
    nombreUsuario: doc.username,
    nombre: doc.name,
    apellido: doc.lastname,
    telefono: doc.telephone,
    cuentaActual: doc.currentAccount
  };
}

export function aPerfil(documento: unknown): Perfil {
  const resultado = esquemaTipo.safeParse(documento);
  if (!resultado.success) throw documentoInvalido(resultado.error);

  const tipo = resultado.data.type;
  if (tipo === 'User') return aUsuario(documento);
  if (tipo === 'Admin') return aAdministrador(documento);

  throw new ErrorAplicacion('VARIANTE_DESCONOCIDA', MENSAJES_ERROR.VARIANTE_DESCONOCIDA, { tipo: String(tipo) });
}

export function documentoDeUsuario(
  datos: Omit<Usuario, 'id' | 'tipo'>,
  hashContrasena: string
): DocumentoNuevo {
  return {
    type: 'User',
    email: datos.correo,
    username: datos.nombreUsuario,
    password: hashContrasena,
    name: datos.nombre,
    lastname: datos.apellido,
    telephone: datos.telefono,
    gender: datos.genero,
    card: datos.tarjeta
  };
}

export function documentoDeAdministrador(
  datos: Omit<Administrador, 'id' | 'tipo'>,
  hashContrasena: string
): DocumentoNuevo {
  return {
    type: 'Admin',
    email: datos.correo,
    username: datos.nombreUsuario,
    password: hashContrasena,
    name: datos.nombre,
    lastname: datos.apellido,
    telephone: datos.telefono,
    currentAccount: datos.cuentaActual
  };
}
