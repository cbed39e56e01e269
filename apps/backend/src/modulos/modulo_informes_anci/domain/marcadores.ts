/**
 * Valores de los marcadores `{{MARCADOR}}` de las plantillas ANCI.
 */
import { formatearFechaInforme } from '../../../compartido/utilidades/fechas';
import { NOMBRES_INFORME, type TipoInforme } from '../../modulo_incidentes/domain/plazos';
import { codigosTaxonomia, etiquetaEstado, type ContextoInforme } from './informeEstructurado';

export const MARCADORES = [
  'FECHA_REPORTE',
  'TIPO_REPORTE',
  'ID_INCIDENTE',
  'TITULO_INCIDENTE',
  'DESCRIPCION',
  'FECHA_DETECCION',
  'FECHA_OCURRENCIA',
  'CRITICIDAD',
  'ESTADO',
  'RAZON_SOCIAL',
  'RUT_EMPRESA',
  'TIPO_EMPRESA',
  'SECTOR_ESENCIAL',
  'ORIGEN_INCIDENTE',
  'SISTEMAS_AFECTADOS',
  'SERVICIOS_INTERRUMPIDOS',
  'ALCANCE_GEOGRAFICO',
  'RESPONSABLE_CLIENTE',
  'REPORTE_ANCI_ID',
  'FECHA_DECLARACION_ANCI',
  'TIPO_AMENAZA',
  'TAXONOMIAS',
  'IMPACTO_PRELIMINAR',
  'MEDIDAS_CONTENCION',
  'CAUSA_RAIZ',
  'LECCIONES_APRENDIDAS',
  'PLAN_MEJORA',
  'PLAZO_LIMITE'
] as const;

export type Marcador = (typeof MARCADORES)[number];
export type ValoresMarcadores = Record<Marcador, string>;

export const VALOR_VACIO = 'N/A';

export function esMarcadorConocido(nombre: string): nombre is Marcador {
  return MARCADORES.some((m) => m === nombre);
}

export function construirMarcadores(tipo: TipoInforme, contexto: ContextoInforme, fechaReporte: Date): ValoresMarcadores {
  const { semilla, zonaHoraria } = contexto;
  const { informante, identificacion, impacto, respuesta, causaRaiz, lecciones, seguimiento, anci } = semilla;
  const fecha = (valor: Date | string | null) => formatearFechaInforme(valor, zonaHoraria);

  const crudos: ValoresMarcadores = {
    FECHA_REPORTE: fecha(fechaReporte),
    TIPO_REPORTE: NOMBRES_INFORME[tipo].toUpperCase(),
    ID_INCIDENTE: semilla.metadatos.indiceUnico,
    TITULO_INCIDENTE: identificacion.titulo,
    DESCRIPCION: identificacion.descripcion,
    FECHA_DETECCION: fecha(identificacion.fechaDeteccion),
    FECHA_OCURRENCIA: fecha(identificacion.fechaOcurrencia),
    CRITICIDAD: identificacion.criticidad,
    ESTADO: etiquetaEstado(contexto.estadoIncidente),
    RAZON_SOCIAL: informante.razonSocial,
    RUT_EMPRESA: informante.rut,
    TIPO_EMPRESA: informante.tipoEntidad,
    SECTOR_ESENCIAL: informante.sectorEsencial,
    ORIGEN_INCIDENTE: identificacion.origen,
    SISTEMAS_AFECTADOS: identificacion.sistemasAfectados.join(', '),
    SERVICIOS_INTERRUMPIDOS: identificacion.serviciosInterrumpidos,
    ALCANCE_GEOGRAFICO: identificacion.alcanceGeografico,
    RESPONSABLE_CLIENTE: seguimiento.responsable,
    REPORTE_ANCI_ID: anci.folioAnci,
    FECHA_DECLARACION_ANCI: fecha(anci.fechaDeclaracion),
    TIPO_AMENAZA: anci.tipoAmenaza,
    TAXONOMIAS: codigosTaxonomia(semilla).join(', '),
    IMPACTO_PRELIMINAR: impacto.impactoOperativo,
    MEDIDAS_CONTENCION: respuesta.medidasContencion,
    CAUSA_RAIZ: causaRaiz.causaIdentificada || causaRaiz.analisisPreliminar,
    LECCIONES_APRENDIDAS: lecciones.leccionesAprendidas,
    PLAN_MEJORA: lecciones.planMejora,
    PLAZO_LIMITE: fecha(contexto.plazoLimite)
  };

  const valores = { ...crudos };
  for (const marcador of MARCADORES) {
    if (!valores[marcador].trim()) valores[marcador] = VALOR_VACIO;
  }
  return valores;
}
