/**
 * RUT chileno: normalizacion y digito verificador (modulo 11).
 */

export function calcularDigitoVerificador(numero: string): string {
  let suma = 0;
  let multiplicador = 2;
  for (const digito of numero.split('').reverse()) {
    suma += Number(digito) * multiplicador;
    multiplicador = multiplicador < 7 ? multiplicador + 1 : 2;
  }
  const resto = suma % 11;
  if (resto === 0) return '0';
  if (resto === 1) return 'K';
  return String(11 - resto);
}

function limpiarRut(valor: string): string {
  return String(valor ?? '')
    .replace(/[.\s-]/g, '')
    .toUpperCase();
}

export function esRutValido(valor: string): boolean {
  const limpio = limpiarRut(valor);
  if (limpio.length < 8 || limpio.length > 9) return false;
  const numero = limpio.slice(0, -1);
  const dv = limpio.slice(-1);
  if (!/^\d+$/.test(numero)) return false;
  return calcularDigitoVerificador(numero) === dv;
}

/** `12.345.678-5` → `12345678-5`. No valida. */
export function normalizarRut(valor: string): string {
  const limpio = limpiarRut(valor);
  if (limpio.length < 2) return limpio;
  return `${limpio.slice(0, -1)}-${limpio.slice(-1)}`;
}

export function rutSinDigitoVerificador(valor: string): string {
  return normalizarRut(valor).split('-')[0] ?? '';
}
