/**
 * Reconocimiento de errores del driver de MongoDB.
 */

export const CODIGO_CLAVE_DUPLICADA = 11000;

export interface ErrorClaveDuplicada {
  code: typeof CODIGO_CLAVE_DUPLICADA;
  keyPattern?: Record<string, unknown>;
  keyValue?: Record<string, unknown>;
}

export function esErrorClaveDuplicada(error: unknown): error is ErrorClaveDuplicada {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === CODIGO_CLAVE_DUPLICADA;
}

/**
 * Campos del indice unico que provoco el conflicto.
 * Versiones antiguas del servidor solo informan `keyValue`.
 */
export function camposDuplicados(error: ErrorClaveDuplicada): string[] {
  const origen = error.keyPattern ?? error.keyValue ?? {};
  return Object.keys(origen);
}
