/**
 * Error estandar de la aplicacion.
 *
 * Cada operacion del almacen de perfiles falla con un solo `codigo` estable;
 * el controlador lo traduce a un mensaje para la vista.
 *
 * Notas:
 * - La causa original (error del driver) se registra en el log y no viaja
 *   en el error que recibe el llamador.
 * - `detalles` se usa para validaciones (`zod.flatten()`) y para indicar que
 *   campos de credencial estan duplicados.
 */
export type CodigoError =
  | 'CREDENCIAL_DUPLICADA'
  | 'FALLO_REGISTRO'
  | 'FALLO_VERIFICACION'
  | 'FALLO_INICIO_SESION'
  | 'FALLO_CONSULTA'
  | 'FALLO_ACTUALIZACION'
  | 'FALLO_ELIMINACION'
  | 'VARIANTE_DESCONOCIDA'
  | 'DOCUMENTO_INVALIDO'
  | 'VALIDACION'
  | 'POOL_CERRADO';

export class ErrorAplicacion extends Error {
  codigo: CodigoError;
  detalles?: unknown;

  constructor(codigo: CodigoError, mensaje: string, detalles?: unknown) {
    super(mensaje);
    this.name = 'ErrorAplicacion';
    this.codigo = codigo;
    this.detalles = detalles;
  }
}

export function esErrorAplicacion(error: unknown, codigo?: CodigoError): error is ErrorAplicacion {
  if (!(error instanceof ErrorAplicacion)) return false;
  return codigo === undefined || error.codigo === codigo;
}
