/**
 * Tipos del documento "semilla" de un incidente.
 *
 * La semilla es el snapshot canonico del formulario ANCI; los informes se
 * generan exclusivamente a partir de ella. Fechas como ISO 8601 (string) para
 * que el checksum sea estable entre serializaciones.
 */
import type { TipoEmpresa } from './plazos';

export const VERSION_FORMATO_SEMILLA = '2.0';

export type TipoSemilla = 'original' | 'base' | 'editando';
export type EstadoRegistro = 'activo' | 'eliminado';

export const CRITICIDADES = ['Baja', 'Media', 'Alta', 'Critica'] as const;
export type Criticidad = (typeof CRITICIDADES)[number];

export type EvidenciaSemilla = {
  archivoId: string;
  numero: string;
  nombreOriginal: string;
  ruta: string;
  tipoMime: string;
  tamanoBytes: number;
  hashSha256: string;
  descripcion: string;
  subidoPor: string;
  subidoEn: string;
  estado: EstadoRegistro;
  eliminadoEn: string | null;
};

export type ContenedorEvidencias = {
  contador: number;
  items: EvidenciaSemilla[];
};

export type MetadatosSemilla = {
  versionFormato: string;
  indiceUnico: string;
  incidenteId: string | null;
  empresaId: string;
  version: number;
  tipoSemilla: TipoSemilla;
  creadoEn: string;
  actualizadoEn: string;
  creadoPor: string;
  modificadoPor: string;
  checksum: string | null;
};

/** Seccion 1. */
export type SeccionInformante = {
  razonSocial: string;
  rut: string;
  tipoEntidad: TipoEmpresa | '';
  sectorEsencial: string;
  nombreInformante: string;
  cargoInformante: string;
  emailInformante: string;
  telefono24x7: string;
  emailOficialSeguridad: string;
};

/** Seccion 2. */
export type SeccionIdentificacion = {
  titulo: string;
  descripcion: string;
  fechaDeteccion: string;
  fechaOcurrencia: string | null;
  criticidad: Criticidad | '';
  origen: string;
  sistemasAfectados: string[];
  serviciosInterrumpidos: string;
  servicioEsencialAfectado: boolean;
  alcanceGeografico: string;
  incidenteEnCurso: boolean | null;
  contencionAplicada: boolean | null;
  descripcionEstadoActual: string;
  evidencias: ContenedorEvidencias;
};

/** Seccion 3. */
export type SeccionImpacto = {
  usuariosAfectados: number | null;
  tipoUsuariosAfectados: string;
  impactoOperativo: string;
  impactoEconomico: string;
  impactoReputacional: string;
  datosComprometidos: boolean | null;
  evidencias: ContenedorEvidencias;
};

export type CambioTaxonomia = {
  accion: 'agregar' | 'actualizar' | 'eliminar';
  codigo: string;
  idUnico: string;
  usuario: string;
  fecha: string;
};

export type TaxonomiaSeleccionada = {
  idUnico: string;
  codigo: string;
  numeroOrden: number;
  estado: EstadoRegistro;
  version: number;
  justificacion: string;
  descripcionProblema: string;
  asignadaPor: string;
  asignadaEn: string;
  eliminadaEn: string | null;
  evidencias: ContenedorEvidencias;
};

/** Seccion 4. */
export type SeccionTaxonomias = {
  seleccionadas: TaxonomiaSeleccionada[];
  contadorGlobal: number;
  historialCambios: CambioTaxonomia[];
};

/** Seccion 5. */
export type SeccionRespuesta = {
  accionesInmediatas: string;
  medidasContencion: string;
  sistemasAislados: string[];
  solicitarApoyoCsirt: boolean;
  tipoApoyoCsirt: string;
  evidencias: ContenedorEvidencias;
};

/** Seccion 6. */
export type SeccionCausaRaiz = {
  analisisPreliminar: string;
  causaIdentificada: string;
  vectorAtaque: string;
  vulnerabilidadExplotada: string;
  factoresContribuyentes: string;
  evidencias: ContenedorEvidencias;
};

/** Seccion 7. */
export type SeccionLecciones = {
  leccionesAprendidas: string;
  accionesCorrectivas: string;
  accionesPreventivas: string;
  planMejora: string;
};

/** Seccion 8. */
export type SeccionSeguimiento = {
  responsable: string;
  proximaRevision: string | null;
  observaciones: string;
  fechaCierre: string | null;
};

export type IocsAnci = {
  ips: string[];
  hashes: string[];
  dominios: string[];
  urls: string[];
  cuentasComprometidas: string[];
};

export type PlanAccionOiv = {
  programaRecuperacion: string;
  responsablePlan: string;
  recursosAsignados: string;
  fechaImplementacion: string | null;
};

export type ImpactoEconomicoAnci = {
  costosRecuperacion: number | null;
  perdidasOperacionales: number | null;
  moneda: string;
};

export type CoordinacionesAnci = {
  notificoCsirt: boolean;
  notificoPolicia: boolean;
  notificoFiscalia: boolean;
  notificoTitulares: boolean;
  otrasEntidades: string;
};

/** Seccion 9. */
export type SeccionAnci = {
  folioAnci: string;
  fechaDeclaracion: string | null;
  tipoAmenaza: string;
  volumenDatosGb: number | null;
  iocs: IocsAnci;
  planAccion: PlanAccionOiv;
  impactoEconomico: ImpactoEconomicoAnci;
  coordinaciones: CoordinacionesAnci;
};

export type SemillaIncidente = {
  metadatos: MetadatosSemilla;
  informante: SeccionInformante;
  identificacion: SeccionIdentificacion;
  impacto: SeccionImpacto;
  taxonomias: SeccionTaxonomias;
  respuesta: SeccionRespuesta;
  causaRaiz: SeccionCausaRaiz;
  lecciones: SeccionLecciones;
  seguimiento: SeccionSeguimiento;
  anci: SeccionAnci;
};

export type ClaveSeccion = Exclude<keyof SemillaIncidente, 'metadatos'>;

export const NUMERO_SECCION: Record<ClaveSeccion, number> = {
  informante: 1,
  identificacion: 2,
  impacto: 3,
  taxonomias: 4,
  respuesta: 5,
  causaRaiz: 6,
  lecciones: 7,
  seguimiento: 8,
  anci: 9
};

/** Secciones que aceptan evidencias propias y su prefijo de numeracion. */
export const PREFIJO_EVIDENCIAS_SECCION = {
  identificacion: '2.5',
  impacto: '3.4',
  respuesta: '5.2',
  causaRaiz: '6.4'
} as const;
export type SeccionConEvidencias = keyof typeof PREFIJO_EVIDENCIAS_SECCION;
export const SECCIONES_CON_EVIDENCIAS: readonly SeccionConEvidencias[] = ['identificacion', 'impacto', 'respuesta', 'causaRaiz'];

export const PREFIJO_EVIDENCIAS_TAXONOMIA = '4.4';

type SinEvidencias<T> = Partial<Omit<T, 'evidencias'>>;

/** Cambios editables desde el formulario; metadatos y listas de evidencias quedan fuera. */
export type CambiosSemilla = {
  informante?: Partial<SeccionInformante>;
  identificacion?: SinEvidencias<SeccionIdentificacion>;
  impacto?: SinEvidencias<SeccionImpacto>;
  respuesta?: SinEvidencias<SeccionRespuesta>;
  causaRaiz?: SinEvidencias<SeccionCausaRaiz>;
  lecciones?: Partial<SeccionLecciones>;
  seguimiento?: Partial<SeccionSeguimiento>;
  anci?: Partial<Omit<SeccionAnci, 'iocs' | 'planAccion' | 'impactoEconomico' | 'coordinaciones'>> & {
    iocs?: Partial<IocsAnci>;
    planAccion?: Partial<PlanAccionOiv>;
    impactoEconomico?: Partial<ImpactoEconomicoAnci>;
    coordinaciones?: Partial<CoordinacionesAnci>;
  };
};

export type ArchivoEvidencia = Omit<EvidenciaSemilla, 'numero' | 'estado' | 'eliminadoEn'>;

export type UbicacionEvidencia =
  | { tipo: 'seccion'; seccion: SeccionConEvidencias }
  | { tipo: 'taxonomia'; idUnico: string; codigo: string };

export type EvidenciaListada = EvidenciaSemilla & { ubicacion: UbicacionEvidencia };
