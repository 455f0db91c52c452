/**
 * Helper de validacion con Zod para entradas del almacen.
 *
 * Idea:
 * - Validar y normalizar lo mas cerca posible del borde (controlador/almacen).
 * - Si el schema transforma (trim, lower-case), el resto del codigo puede
 *   asumir datos ya normalizados.
 */
import type { z } from 'zod';
import { ErrorAplicacion } from '../errores/errorAplicacion';
import { MENSAJES_ERROR } from '../errores/mensajesError';

export function validarDatos<S extends z.ZodTypeAny>(schema: S, datos: unknown): z.output<S> {
  const resultado = schema.safeParse(datos);
  if (!resultado.success) {
    throw new ErrorAplicacion('VALIDACION', MENSAJES_ERROR.VALIDACION, resultado.error.flatten());
  }
  return resultado.data;
}
