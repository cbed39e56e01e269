/**
 * Utilidades de texto para nombres de archivo, indices y resumenes de informe.
 */

export function truncar(valor: string, maxLen: number, sufijo = '...'): string {
  const texto = String(valor ?? '');
  if (texto.length <= maxLen) return texto;
  return `${texto.slice(0, maxLen)}${sufijo}`;
}

/**
 * Deja un texto apto para nombre de archivo o indice de incidente: sin
 * diacriticos, espacios como `_` y solo `[a-zA-Z0-9._-]`.
 */
export function normalizarParaNombreArchivo(valor: unknown, opciones?: { maxLen?: number }): string {
  const maxLen = Math.max(8, Math.floor(opciones?.maxLen ?? 80));
  const sinAcentos = String(valor ?? '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim();
  if (!sinAcentos) return '';

  const recortarBordes = (texto: string) => texto.replace(/^[-_.]+/, '').replace(/[-_.]+$/, '');
  const limpio = recortarBordes(
    sinAcentos
      .replace(/\s+/g, '_')
      .replace(/[<>:"/\\|?*\p{Cc}]/gu, '')
      .replace(/[^a-zA-Z0-9._-]+/g, '-')
      .replace(/-+/g, '-')
      .replace(/_+/g, '_')
  );

  if (limpio.length <= maxLen) return limpio;
  return limpio.slice(0, maxLen).replace(/[-_.]+$/, '');
}
