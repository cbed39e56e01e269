/**
 * Plazos de reporte ANCI (Ley 21.663).
 *
 * Funciones puras: reciben la clasificacion de la empresa, si hubo servicio
 * esencial afectado y la fecha de deteccion; no consultan reloj ni base de datos.
 *
 * | Informe            | Offset                                      | Aplica    |
 * | ------------------ | ------------------------------------------- | --------- |
 * | alerta_temprana    | 3 h                                         | todas     |
 * | informe_preliminar | 24 h (OIV con servicio esencial) / 72 h     | todas     |
 * | informe_completo   | 72 h                                        | todas     |
 * | plan_accion        | 7 dias                                      | solo OIV  |
 * | informe_final      | `diasInformeFinal` (15 por defecto)         | todas     |
 */
export const TIPOS_EMPRESA = ['OIV', 'PSE', 'AMBAS'] as const;
export type TipoEmpresa = (typeof TIPOS_EMPRESA)[number];

export const TIPOS_INFORME = [
  'alerta_temprana',
  'informe_preliminar',
  'informe_completo',
  'plan_accion',
  'informe_final'
] as const;
export type TipoInforme = (typeof TIPOS_INFORME)[number];

export const NOMBRES_INFORME: Record<TipoInforme, string> = {
  alerta_temprana: 'Alerta Temprana',
  informe_preliminar: 'Informe Preliminar',
  informe_completo: 'Informe Completo',
  plan_accion: 'Plan de Acción',
  informe_final: 'Informe Final'
};

export const HORAS_ALERTA_TEMPRANA = 3;
export const HORAS_PRELIMINAR_OIV_ESENCIAL = 24;
export const HORAS_PRELIMINAR_GENERAL = 72;
export const HORAS_INFORME_COMPLETO = 72;
export const DIAS_PLAN_ACCION = 7;
export const DIAS_INFORME_FINAL_POR_DEFECTO = 15;

const MS_POR_HORA = 60 * 60 * 1000;

export type DatosPlazo = {
  tipoEmpresa: TipoEmpresa;
  servicioEsencialAfectado: boolean;
  fechaDeteccion: Date;
};

export type OpcionesPlazo = {
  diasInformeFinal?: number;
};

export type PlazoInforme = {
  tipo: TipoInforme;
  nombre: string;
  horas: number;
  limite: Date;
};

export type EstadoCuentaRegresiva = 'pendiente' | 'por_vencer' | 'vencido' | 'enviado';

export type EstadoPlazo = PlazoInforme & {
  horasRestantes: number;
  vencido: boolean;
  estado: EstadoCuentaRegresiva;
  enviadoEn: Date | null;
  enviadoATiempo: boolean | null;
};

export type CuentaRegresiva = {
  plazos: EstadoPlazo[];
  proximo: EstadoPlazo | null;
};

export function esOiv(tipoEmpresa: TipoEmpresa): boolean {
  return tipoEmpresa === 'OIV' || tipoEmpresa === 'AMBAS';
}

export function informeAplica(tipo: TipoInforme, tipoEmpresa: TipoEmpresa): boolean {
  return tipo !== 'plan_accion' || esOiv(tipoEmpresa);
}

export function horasPlazo(tipo: TipoInforme, datos: Omit<DatosPlazo, 'fechaDeteccion'>, opciones: OpcionesPlazo = {}): number {
  switch (tipo) {
    case 'alerta_temprana':
      return HORAS_ALERTA_TEMPRANA;
    case 'informe_preliminar':
      return esOiv(datos.tipoEmpresa) && datos.servicioEsencialAfectado
        ? HORAS_PRELIMINAR_OIV_ESENCIAL
        : HORAS_PRELIMINAR_GENERAL;
    case 'informe_completo':
      return HORAS_INFORME_COMPLETO;
    case 'plan_accion':
      return DIAS_PLAN_ACCION * 24;
    case 'informe_final':
      return (opciones.diasInformeFinal ?? DIAS_INFORME_FINAL_POR_DEFECTO) * 24;
  }
}

export function calcularPlazos(datos: DatosPlazo, opciones: OpcionesPlazo = {}): PlazoInforme[] {
  const base = datos.fechaDeteccion.getTime();
  return TIPOS_INFORME.filter((tipo) => informeAplica(tipo, datos.tipoEmpresa)).map((tipo) => {
    const horas = horasPlazo(tipo, datos, opciones);
    return {
      tipo,
      nombre: NOMBRES_INFORME[tipo],
      horas,
      limite: new Date(base + horas * MS_POR_HORA)
    };
  });
}

function redondear2(valor: number): number {
  return Math.round(valor * 100) / 100;
}

export function evaluarPlazo(
  plazo: PlazoInforme,
  ahora: Date,
  enviadoEn: Date | null = null,
  umbralPorVencer = 0.25
): EstadoPlazo {
  const restanteMs = plazo.limite.getTime() - ahora.getTime();
  const horasRestantes = redondear2(Math.max(0, restanteMs / MS_POR_HORA));
  const vencido = !enviadoEn && restanteMs < 0;

  let estado: EstadoCuentaRegresiva;
  if (enviadoEn) estado = 'enviado';
  else if (vencido) estado = 'vencido';
  else if (restanteMs <= plazo.horas * MS_POR_HORA * umbralPorVencer) estado = 'por_vencer';
  else estado = 'pendiente';

  return {
    ...plazo,
    horasRestantes,
    vencido,
    estado,
    enviadoEn,
    enviadoATiempo: enviadoEn ? enviadoEn.getTime() <= plazo.limite.getTime() : null
  };
}

export function cuentaRegresiva(
  datos: DatosPlazo,
  ahora: Date,
  enviados: Partial<Record<TipoInforme, Date>> = {},
  opciones: OpcionesPlazo & { umbralPorVencer?: number } = {}
): CuentaRegresiva {
  const plazos = calcularPlazos(datos, opciones).map((plazo) =>
    evaluarPlazo(plazo, ahora, enviados[plazo.tipo] ?? null, opciones.umbralPorVencer)
  );
  const proximo = plazos.find((plazo) => plazo.estado === 'pendiente' || plazo.estado === 'por_vencer') ?? null;
  return { plazos, proximo };
}
