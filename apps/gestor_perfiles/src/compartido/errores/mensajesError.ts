/**
 * Mensajes para la vista, uno por codigo de error.
 */
import type { CodigoError } from './errorAplicacion';

export const MENSAJES_ERROR: Record<CodigoError, string> = {
  CREDENCIAL_DUPLICADA: 'El correo o el nombre de usuario ya estan registrados.',
  FALLO_REGISTRO: 'No se pudo registrar el usuario.',
  FALLO_VERIFICACION: 'No se pudo comprobar si las credenciales ya existen.',
  FALLO_INICIO_SESION: 'No se pudo iniciar sesion.',
  FALLO_CONSULTA: 'No se pudo obtener la lista de usuarios.',
  FALLO_ACTUALIZACION: 'No se pudo actualizar el usuario.',
  FALLO_ELIMINACION: 'No se pudo eliminar el usuario.',
  VARIANTE_DESCONOCIDA: 'El perfil almacenado tiene un tipo desconocido.',
  DOCUMENTO_INVALIDO: 'El perfil almacenado esta incompleto.',
  VALIDACION: 'Revisa los datos introducidos.',
  POOL_CERRADO: 'La conexion con la base de datos ya se cerro.'
};

export const MENSAJE_ERROR_INESPERADO = 'Ocurrio un error inesperado.';
