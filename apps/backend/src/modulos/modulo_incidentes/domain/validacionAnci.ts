/**
 * Campos obligatorios por tipo de informe ANCI.
 *
 * Cada informe exige lo del anterior en la cadena
 * alerta → preliminar/completo → plan de accion / final.
 */
import type { TipoInforme } from './plazos';
import { taxonomiasActivas } from './semilla';
import { NUMERO_SECCION, type ClaveSeccion, type SemillaIncidente } from './tiposSemilla';

export type CampoFaltante = {
  seccion: number;
  campo: string;
  etiqueta: string;
};

export type ResultadoValidacionAnci = {
  tipoInforme: TipoInforme;
  valido: boolean;
  faltantes: CampoFaltante[];
};

type Regla = {
  seccion: ClaveSeccion;
  campo: string;
  etiqueta: string;
  valor: (semilla: SemillaIncidente) => unknown;
};

function regla(seccion: ClaveSeccion, campo: string, etiqueta: string, valor: Regla['valor']): Regla {
  return { seccion, campo, etiqueta, valor };
}

const REGLAS_ALERTA: Regla[] = [
  regla('informante', 'razonSocial', 'Razón social', (s) => s.informante.razonSocial),
  regla('informante', 'tipoEntidad', 'Tipo de entidad', (s) => s.informante.tipoEntidad),
  regla('informante', 'sectorEsencial', 'Sector esencial', (s) => s.informante.sectorEsencial),
  regla('informante', 'nombreInformante', 'Nombre del contacto', (s) => s.informante.nombreInformante),
  regla('informante', 'cargoInformante', 'Cargo del contacto', (s) => s.informante.cargoInformante),
  regla('informante', 'telefono24x7', 'Teléfono 24/7', (s) => s.informante.telefono24x7),
  regla('informante', 'emailOficialSeguridad', 'Email oficial de seguridad', (s) => s.informante.emailOficialSeguridad),
  regla('identificacion', 'descripcion', 'Descripción del incidente', (s) => s.identificacion.descripcion),
  regla('identificacion', 'sistemasAfectados', 'Sistemas afectados', (s) => s.identificacion.sistemasAfectados),
  regla('identificacion', 'alcanceGeografico', 'Alcance geográfico', (s) => s.identificacion.alcanceGeografico),
  regla('taxonomias', 'seleccionadas', 'Al menos una taxonomía', (s) => taxonomiasActivas(s)),
  regla('identificacion', 'incidenteEnCurso', 'Incidente en curso', (s) => s.identificacion.incidenteEnCurso),
  regla('identificacion', 'descripcionEstadoActual', 'Descripción del estado actual', (s) => s.identificacion.descripcionEstadoActual),
  regla('respuesta', 'medidasContencion', 'Medidas de contención', (s) => s.respuesta.medidasContencion)
];

const REGLAS_PRELIMINAR: Regla[] = [
  ...REGLAS_ALERTA,
  regla('identificacion', 'criticidad', 'Criticidad', (s) => s.identificacion.criticidad),
  regla('impacto', 'impactoOperativo', 'Impacto operativo', (s) => s.impacto.impactoOperativo),
  regla('causaRaiz', 'analisisPreliminar', 'Análisis preliminar de causa', (s) => s.causaRaiz.analisisPreliminar),
  regla('respuesta', 'accionesInmediatas', 'Acciones inmediatas', (s) => s.respuesta.accionesInmediatas)
];

const REGLAS_PLAN_ACCION: Regla[] = [
  ...REGLAS_PRELIMINAR,
  regla('anci', 'planAccion.programaRecuperacion', 'Programa de recuperación', (s) => s.anci.planAccion.programaRecuperacion),
  regla('anci', 'planAccion.responsablePlan', 'Responsable del plan', (s) => s.anci.planAccion.responsablePlan)
];

const REGLAS_FINAL: Regla[] = [
  ...REGLAS_PRELIMINAR,
  regla('causaRaiz', 'causaIdentificada', 'Causa raíz identificada', (s) => s.causaRaiz.causaIdentificada),
  regla('lecciones', 'leccionesAprendidas', 'Lecciones aprendidas', (s) => s.lecciones.leccionesAprendidas),
  regla('lecciones', 'accionesCorrectivas', 'Acciones correctivas', (s) => s.lecciones.accionesCorrectivas)
];

const REGLAS_POR_INFORME: Record<TipoInforme, Regla[]> = {
  alerta_temprana: REGLAS_ALERTA,
  informe_preliminar: REGLAS_PRELIMINAR,
  informe_completo: REGLAS_PRELIMINAR,
  plan_accion: REGLAS_PLAN_ACCION,
  informe_final: REGLAS_FINAL
};

function faltaValor(valor: unknown): boolean {
  if (valor === null || valor === undefined) return true;
  if (typeof valor === 'string') return valor.trim() === '';
  if (Array.isArray(valor)) return valor.length === 0;
  return false;
}

export function validarCamposAnci(semilla: SemillaIncidente, tipoInforme: TipoInforme): ResultadoValidacionAnci {
  const faltantes = REGLAS_POR_INFORME[tipoInforme]
    .filter((r) => faltaValor(r.valor(semilla)))
    .map((r) => ({ seccion: NUMERO_SECCION[r.seccion], campo: r.campo, etiqueta: r.etiqueta }));
  return { tipoInforme, valido: faltantes.length === 0, faltantes };
}
