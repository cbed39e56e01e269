/**
 * Formato de fechas para informes (zona horaria configurable).
 */

type PartesFecha = { anio: string; mes: string; dia: string; hora: string; minuto: string; segundo: string };

const formateadores = new Map<string, Intl.DateTimeFormat>();

function formateadorPara(zonaHoraria: string): Intl.DateTimeFormat {
  const existente = formateadores.get(zonaHoraria);
  if (existente) return existente;
  const nuevo = new Intl.DateTimeFormat('en-US', {
    timeZone: zonaHoraria,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  });
  formateadores.set(zonaHoraria, nuevo);
  return nuevo;
}

export function aFecha(valor: Date | string | null | undefined): Date | null {
  if (valor === null || valor === undefined || valor === '') return null;
  const fecha = valor instanceof Date ? valor : new Date(valor);
  return Number.isNaN(fecha.getTime()) ? null : fecha;
}

export function partesFecha(fecha: Date, zonaHoraria: string): PartesFecha {
  const partes: PartesFecha = { anio: '', mes: '', dia: '', hora: '', minuto: '', segundo: '' };
  for (const parte of formateadorPara(zonaHoraria).formatToParts(fecha)) {
    if (parte.type === 'year') partes.anio = parte.value;
    else if (parte.type === 'month') partes.mes = parte.value;
    else if (parte.type === 'day') partes.dia = parte.value;
    else if (parte.type === 'hour') partes.hora = parte.value;
    else if (parte.type === 'minute') partes.minuto = parte.value;
    else if (parte.type === 'second') partes.segundo = parte.value;
  }
  return partes;
}

/** `dd/mm/aaaa HH:MM`; cadena vacia si la fecha no es valida. */
export function formatearFechaInforme(valor: Date | string | null | undefined, zonaHoraria: string): string {
  const fecha = aFecha(valor);
  if (!fecha) return '';
  const p = partesFecha(fecha, zonaHoraria);
  return `${p.dia}/${p.mes}/${p.anio} ${p.hora}:${p.minuto}`;
}

/** `aaaammddHHMMSS` para nombres de archivo. */
export function marcaTiempoArchivo(fecha: Date, zonaHoraria: string): string {
  const p = partesFecha(fecha, zonaHoraria);
  return `${p.anio}${p.mes}${p.dia}${p.hora}${p.minuto}${p.segundo}`;
}
