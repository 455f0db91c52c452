/**
 * Tipos de dominio de los perfiles.
 *
 * `Perfil` es una union etiquetada por `tipo`; el valor coincide con el
 * discriminador `type` que se guarda en la coleccion `profiles`.
 */
export const GENEROS = ['MALE', 'FEMALE', 'OTHER'] as const;
export type Genero = (typeof GENEROS)[number];

export const TIPOS_PERFIL = ['User', 'Admin'] as const;
export type TipoPerfil = (typeof TIPOS_PERFIL)[number];

interface DatosPerfil {
  id: string;
  correo: string;
  nombreUsuario: string;
  nombre: string;
  apellido: string;
  telefono: string;
}

export interface Usuario extends DatosPerfil {
  tipo: 'User';
  genero: Genero;
  tarjeta: string;
}

export interface Administrador extends DatosPerfil {
  tipo: 'Admin';
  cuentaActual: string;
}

export type Perfil = Usuario | Administrador;

export function esAdministrador(perfil: Perfil | null): perfil is Administrador {
  return perfil?.tipo === 'Admin';
}
