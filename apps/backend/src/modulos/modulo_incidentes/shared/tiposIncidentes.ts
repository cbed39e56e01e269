/**
 * Tipos internos del modulo de incidentes.
 */
import type { TipoInforme } from '../domain/plazos';
import type { Criticidad, SemillaIncidente } from '../domain/tiposSemilla';

export const ESTADOS_INCIDENTE = ['abierto', 'en_investigacion', 'contenido', 'cerrado'] as const;
export type EstadoIncidente = (typeof ESTADOS_INCIDENTE)[number];

export type ReporteEnviado = {
  tipoInforme: TipoInforme;
  enviadoEn: Date;
  folioAnci: string;
  registradoPor: string;
  registradoEn: Date;
};

export type Incidente = {
  id: string;
  indiceUnico: string;
  empresaId: string;
  titulo: string;
  criticidad: Criticidad | '';
  estado: EstadoIncidente;
  fechaDeteccion: Date;
  servicioEsencialAfectado: boolean;
  semillaOriginal: SemillaIncidente;
  semillaBase: SemillaIncidente;
  semillaEdicion: SemillaIncidente | null;
  reportesEnviados: ReporteEnviado[];
  activo: boolean;
  eliminadoEn: Date | null;
  creadoPor: string;
  creadoEn: Date;
  actualizadoEn: Date;
};

export type NuevoIncidente = Omit<Incidente, 'id' | 'creadoEn' | 'actualizadoEn'>;

export type CambiosIncidente = Partial<
  Omit<Incidente, 'id' | 'indiceUnico' | 'empresaId' | 'creadoPor' | 'creadoEn' | 'actualizadoEn'>
>;

/** Cambios que acompanan al alta de un reporte enviado (p. ej. la base con el folio). */
export type CambiosConReporte = Omit<CambiosIncidente, 'reportesEnviados'>;

export type FiltroIncidentes = {
  empresaIds?: string[];
  estado?: EstadoIncidente;
  incluirEliminados?: boolean;
};

export type CondicionActualizacion = {
  /** Solo actualiza si la semilla base sigue en esta version (concurrencia optimista). */
  versionBase?: number;
};

export interface RepositorioIncidentes {
  siguienteCorrelativo(): Promise<number>;
  crear(datos: NuevoIncidente): Promise<Incidente>;
  buscarPorId(id: string): Promise<Incidente | null>;
  listar(filtro: FiltroIncidentes): Promise<Incidente[]>;
  actualizar(id: string, cambios: CambiosIncidente, condicion?: CondicionActualizacion): Promise<Incidente | null>;
  /**
   * Agrega el reporte en una sola escritura, solo si su tipo aun no figura.
   * `null` si ya estaba registrado, si no se cumple la condicion o si no existe.
   */
  agregarReporteEnviado(
    id: string,
    reporte: ReporteEnviado,
    cambios?: CambiosConReporte,
    condicion?: CondicionActualizacion
  ): Promise<Incidente | null>;
}

export const ACCIONES_EVENTO = [
  'incidente_creado',
  'edicion_iniciada',
  'edicion_guardada',
  'edicion_descartada',
  'original_restaurada',
  'estado_cambiado',
  'taxonomia_agregada',
  'taxonomia_actualizada',
  'taxonomia_eliminada',
  'evidencia_subida',
  'evidencia_eliminada',
  'reporte_enviado',
  'informe_generado',
  'incidente_eliminado'
] as const;
export type AccionEvento = (typeof ACCIONES_EVENTO)[number];

export type EventoIncidente = {
  id: string;
  incidenteId: string;
  empresaId: string;
  accion: AccionEvento;
  usuarioId: string;
  detalles: Record<string, unknown>;
  creadoEn: Date;
};

export type NuevoEvento = Omit<EventoIncidente, 'id'>;

export interface RepositorioEventosIncidente {
  registrar(evento: NuevoEvento): Promise<EventoIncidente>;
  listarPorIncidente(incidenteId: string): Promise<EventoIncidente[]>;
}

/** Vista HTTP del incidente: sin las semillas completas (se piden por separado). */
export type IncidenteResumen = Omit<Incidente, 'semillaOriginal' | 'semillaBase' | 'semillaEdicion'> & {
  versionSemilla: number;
  enEdicion: boolean;
};

export function aResumen(incidente: Incidente): IncidenteResumen {
  const { semillaOriginal: _original, semillaBase, semillaEdicion, ...resto } = incidente;
  return { ...resto, versionSemilla: semillaBase.metadatos.version, enEdicion: semillaEdicion !== null };
}
