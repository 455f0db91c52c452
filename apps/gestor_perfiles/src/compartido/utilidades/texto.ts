/**
 * Utilidades de texto (normalizaciones/formatos).
 */

export function normalizarEspacios(valor: string): string {
  return String(valor || '')
    .trim()
    .replace(/\s+/g, ' ');
}

export function rellenarDerecha(valor: string, ancho: number): string {
  const texto = String(valor ?? '');
  if (texto.length >= ancho) return texto.slice(0, ancho);
  return texto + ' '.repeat(ancho - texto.length);
}
