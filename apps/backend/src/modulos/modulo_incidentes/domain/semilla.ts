/**
 * Operaciones puras sobre la semilla de un incidente.
 *
 * Cada operacion recibe una semilla y devuelve una copia nueva; la semilla de
 * entrada nunca se muta. La persistencia (y el incremento de version) ocurre
 * en el servicio via `prepararParaGuardar`.
 */
import { createHash, randomUUID } from 'node:crypto';
import { ErrorAplicacion } from '../../../compartido/errores/errorAplicacion';
import type { TipoEmpresa } from './plazos';
import {
  NUMERO_SECCION,
  PREFIJO_EVIDENCIAS_SECCION,
  PREFIJO_EVIDENCIAS_TAXONOMIA,
  SECCIONES_CON_EVIDENCIAS,
  VERSION_FORMATO_SEMILLA,
  type ArchivoEvidencia,
  type CambiosSemilla,
  type ClaveSeccion,
  type ContenedorEvidencias,
  type EvidenciaListada,
  type EvidenciaSemilla,
  type SeccionConEvidencias,
  type SemillaIncidente,
  type TaxonomiaSeleccionada
} from './tiposSemilla';

export type DatosEmpresaSemilla = {
  razonSocial: string;
  rut: string;
  tipoEmpresa: TipoEmpresa;
  sectorEsencial: string;
};

export type DatosSemillaInicial = {
  indiceUnico: string;
  empresaId: string;
  incidenteId: string | null;
  usuario: string;
  ahora: Date;
  empresa: DatosEmpresaSemilla;
  cambios: CambiosSemilla;
};

export type DatosTaxonomia = {
  codigo: string;
  justificacion: string;
  descripcionProblema: string;
};

function contenedorVacio(): ContenedorEvidencias {
  return { contador: 0, items: [] };
}

function clonar<T>(valor: T): T {
  return structuredClone(valor);
}

function estaVacio(valor: unknown): boolean {
  if (valor === null || valor === undefined) return true;
  if (typeof valor === 'string') return valor.trim() === '';
  return false;
}

export function semillaVacia(): SemillaIncidente {
  return {
    metadatos: {
      versionFormato: VERSION_FORMATO_SEMILLA,
      indiceUnico: '',
      incidenteId: null,
      empresaId: '',
      version: 0,
      tipoSemilla: 'original',
      creadoEn: '',
      actualizadoEn: '',
      creadoPor: '',
      modificadoPor: '',
      checksum: null
    },
    informante: {
      razonSocial: '',
      rut: '',
      tipoEntidad: '',
      sectorEsencial: '',
      nombreInformante: '',
      cargoInformante: '',
      emailInformante: '',
      telefono24x7: '',
      emailOficialSeguridad: ''
    },
    identificacion: {
      titulo: '',
      descripcion: '',
      fechaDeteccion: '',
      fechaOcurrencia: null,
      criticidad: '',
      origen: '',
      sistemasAfectados: [],
      serviciosInterrumpidos: '',
      servicioEsencialAfectado: false,
      alcanceGeografico: '',
      incidenteEnCurso: null,
      contencionAplicada: null,
      descripcionEstadoActual: '',
      evidencias: contenedorVacio()
    },
    impacto: {
      usuariosAfectados: null,
      tipoUsuariosAfectados: '',
      impactoOperativo: '',
      impactoEconomico: '',
      impactoReputacional: '',
      datosComprometidos: null,
      evidencias: contenedorVacio()
    },
    taxonomias: { seleccionadas: [], contadorGlobal: 0, historialCambios: [] },
    respuesta: {
      accionesInmediatas: '',
      medidasContencion: '',
      sistemasAislados: [],
      solicitarApoyoCsirt: false,
      tipoApoyoCsirt: '',
      evidencias: contenedorVacio()
    },
    causaRaiz: {
      analisisPreliminar: '',
      causaIdentificada: '',
      vectorAtaque: '',
      vulnerabilidadExplotada: '',
      factoresContribuyentes: '',
      evidencias: contenedorVacio()
    },
    lecciones: { leccionesAprendidas: '', accionesCorrectivas: '', accionesPreventivas: '', planMejora: '' },
    seguimiento: { responsable: '', proximaRevision: null, observaciones: '', fechaCierre: null },
    anci: {
      folioAnci: '',
      fechaDeclaracion: null,
      tipoAmenaza: '',
      volumenDatosGb: null,
      iocs: { ips: [], hashes: [], dominios: [], urls: [], cuentasComprometidas: [] },
      planAccion: { programaRecuperacion: '', responsablePlan: '', recursosAsignados: '', fechaImplementacion: null },
      impactoEconomico: { costosRecuperacion: null, perdidasOperacionales: null, moneda: 'CLP' },
      coordinaciones: {
        notificoCsirt: false,
        notificoPolicia: false,
        notificoFiscalia: false,
        notificoTitulares: false,
        otrasEntidades: ''
      }
    }
  };
}

/**
 * JSON con claves ordenadas: dos semillas con el mismo contenido producen la
 * misma cadena sin importar el orden de insercion.
 */
export function serializarOrdenado(valor: unknown): string {
  if (Array.isArray(valor)) return `[${valor.map((item) => serializarOrdenado(item)).join(',')}]`;
  if (valor !== null && typeof valor === 'object') {
    const entradas = Object.entries(valor)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entradas.map(([clave, v]) => `${JSON.stringify(clave)}:${serializarOrdenado(v)}`).join(',')}}`;
  }
  return JSON.stringify(valor ?? null);
}

export function calcularChecksum(semilla: SemillaIncidente): string {
  const sinChecksum = { ...semilla, metadatos: { ...semilla.metadatos, checksum: null } };
  return createHash('sha256').update(serializarOrdenado(sinChecksum)).digest('hex');
}

export function verificarIntegridad(semilla: SemillaIncidente): boolean {
  return semilla.metadatos.checksum === calcularChecksum(semilla);
}

function sellar(semilla: SemillaIncidente): SemillaIncidente {
  semilla.metadatos.checksum = calcularChecksum(semilla);
  return semilla;
}

export function aplicarCambios(semilla: SemillaIncidente, cambios: CambiosSemilla): SemillaIncidente {
  const s = clonar(semilla);
  if (cambios.informante) Object.assign(s.informante, cambios.informante);
  if (cambios.identificacion) Object.assign(s.identificacion, cambios.identificacion);
  if (cambios.impacto) Object.assign(s.impacto, cambios.impacto);
  if (cambios.respuesta) Object.assign(s.respuesta, cambios.respuesta);
  if (cambios.causaRaiz) Object.assign(s.causaRaiz, cambios.causaRaiz);
  if (cambios.lecciones) Object.assign(s.lecciones, cambios.lecciones);
  if (cambios.seguimiento) Object.assign(s.seguimiento, cambios.seguimiento);
  if (cambios.anci) {
    const { iocs, planAccion, impactoEconomico, coordinaciones, ...resto } = cambios.anci;
    Object.assign(s.anci, resto);
    if (iocs) Object.assign(s.anci.iocs, iocs);
    if (planAccion) Object.assign(s.anci.planAccion, planAccion);
    if (impactoEconomico) Object.assign(s.anci.impactoEconomico, impactoEconomico);
    if (coordinaciones) Object.assign(s.anci.coordinaciones, coordinaciones);
  }
  return s;
}

export function crearSemillaInicial(datos: DatosSemillaInicial): SemillaIncidente {
  const ahoraIso = datos.ahora.toISOString();
  const base = semillaVacia();
  base.informante.razonSocial = datos.empresa.razonSocial;
  base.informante.rut = datos.empresa.rut;
  base.informante.tipoEntidad = datos.empresa.tipoEmpresa;
  base.informante.sectorEsencial = datos.empresa.sectorEsencial;

  const semilla = aplicarCambios(base, datos.cambios);
  semilla.metadatos = {
    ...semilla.metadatos,
    indiceUnico: datos.indiceUnico,
    incidenteId: datos.incidenteId,
    empresaId: datos.empresaId,
    version: 1,
    tipoSemilla: 'original',
    creadoEn: ahoraIso,
    actualizadoEn: ahoraIso,
    creadoPor: datos.usuario,
    modificadoPor: datos.usuario
  };
  return sellar(semilla);
}

/** Copia de trabajo inicial: mismo contenido y version que la original, tipo `base`. */
export function copiaBase(original: SemillaIncidente): SemillaIncidente {
  const s = clonar(original);
  s.metadatos.tipoSemilla = 'base';
  return sellar(s);
}

/** Incrementa version, marca como `base` y recalcula checksum. */
export function prepararParaGuardar(semilla: SemillaIncidente, usuario: string, ahora: Date): SemillaIncidente {
  const s = clonar(semilla);
  s.metadatos.version += 1;
  s.metadatos.tipoSemilla = 'base';
  s.metadatos.modificadoPor = usuario;
  s.metadatos.actualizadoEn = ahora.toISOString();
  return sellar(s);
}

export function marcarEdicion(semilla: SemillaIncidente, usuario: string, ahora: Date): SemillaIncidente {
  const s = clonar(semilla);
  s.metadatos.tipoSemilla = 'editando';
  s.metadatos.modificadoPor = usuario;
  s.metadatos.actualizadoEn = ahora.toISOString();
  return sellar(s);
}

/**
 * Vuelve al contenido de la semilla original conservando la linea de versiones:
 * la restaurada queda con la version actual + 1.
 */
export function restaurarOriginal(
  original: SemillaIncidente,
  actual: SemillaIncidente,
  usuario: string,
  ahora: Date
): SemillaIncidente {
  const s = clonar(original);
  s.metadatos.incidenteId = actual.metadatos.incidenteId;
  s.metadatos.version = actual.metadatos.version;
  return prepararParaGuardar(s, usuario, ahora);
}

export function asignarIncidenteId(semilla: SemillaIncidente, incidenteId: string): SemillaIncidente {
  const s = clonar(semilla);
  s.metadatos.incidenteId = incidenteId;
  return sellar(s);
}

// ---------------------------------------------------------------------------
// Taxonomias
// ---------------------------------------------------------------------------

export function taxonomiasActivas(semilla: SemillaIncidente): TaxonomiaSeleccionada[] {
  return semilla.taxonomias.seleccionadas.filter((tax) => tax.estado === 'activo');
}

function buscarTaxonomiaActiva(semilla: SemillaIncidente, idUnico: string): TaxonomiaSeleccionada {
  const taxonomia = semilla.taxonomias.seleccionadas.find((tax) => tax.idUnico === idUnico && tax.estado === 'activo');
  if (!taxonomia) {
    throw new ErrorAplicacion('TAXONOMIA_NO_ENCONTRADA', 'Taxonomia no encontrada en el incidente', 404);
  }
  return taxonomia;
}

export function agregarTaxonomia(
  semilla: SemillaIncidente,
  datos: DatosTaxonomia,
  usuario: string,
  ahora: Date
): { semilla: SemillaIncidente; taxonomia: TaxonomiaSeleccionada } {
  const duplicada = taxonomiasActivas(semilla).some((tax) => tax.codigo === datos.codigo);
  if (duplicada) {
    throw new ErrorAplicacion('TAXONOMIA_DUPLICADA', `La taxonomia ${datos.codigo} ya esta asignada`, 409);
  }

  const s = clonar(semilla);
  const ahoraIso = ahora.toISOString();
  s.taxonomias.contadorGlobal += 1;
  const taxonomia: TaxonomiaSeleccionada = {
    idUnico: randomUUID(),
    codigo: datos.codigo,
    numeroOrden: s.taxonomias.contadorGlobal,
    estado: 'activo',
    version: 1,
    justificacion: datos.justificacion,
    descripcionProblema: datos.descripcionProblema,
    asignadaPor: usuario,
    asignadaEn: ahoraIso,
    eliminadaEn: null,
    evidencias: contenedorVacio()
  };
  s.taxonomias.seleccionadas.push(taxonomia);
  s.taxonomias.historialCambios.push({
    accion: 'agregar',
    codigo: datos.codigo,
    idUnico: taxonomia.idUnico,
    usuario,
    fecha: ahoraIso
  });
  return { semilla: s, taxonomia };
}

export function actualizarTaxonomia(
  semilla: SemillaIncidente,
  idUnico: string,
  cambios: Partial<Pick<TaxonomiaSeleccionada, 'justificacion' | 'descripcionProblema'>>,
  usuario: string,
  ahora: Date
): { semilla: SemillaIncidente; taxonomia: TaxonomiaSeleccionada } {
  const s = clonar(semilla);
  const taxonomia = buscarTaxonomiaActiva(s, idUnico);
  if (cambios.justificacion !== undefined) taxonomia.justificacion = cambios.justificacion;
  if (cambios.descripcionProblema !== undefined) taxonomia.descripcionProblema = cambios.descripcionProblema;
  taxonomia.version += 1;
  s.taxonomias.historialCambios.push({
    accion: 'actualizar',
    codigo: taxonomia.codigo,
    idUnico,
    usuario,
    fecha: ahora.toISOString()
  });
  return { semilla: s, taxonomia };
}

export function eliminarTaxonomia(
  semilla: SemillaIncidente,
  idUnico: string,
  usuario: string,
  ahora: Date
): SemillaIncidente {
  const s = clonar(semilla);
  const taxonomia = buscarTaxonomiaActiva(s, idUnico);
  const ahoraIso = ahora.toISOString();
  taxonomia.estado = 'eliminado';
  taxonomia.eliminadaEn = ahoraIso;
  s.taxonomias.historialCambios.push({
    accion: 'eliminar',
    codigo: taxonomia.codigo,
    idUnico,
    usuario,
    fecha: ahoraIso
  });
  return s;
}

// ---------------------------------------------------------------------------
// Evidencias
// ---------------------------------------------------------------------------

export function esSeccionConEvidencias(valor: string): valor is SeccionConEvidencias {
  return SECCIONES_CON_EVIDENCIAS.some((seccion) => seccion === valor);
}

function agregarAContenedor(contenedor: ContenedorEvidencias, prefijo: string, archivo: ArchivoEvidencia): EvidenciaSemilla {
  // El contador nunca retrocede: una evidencia eliminada no libera su numero.
  contenedor.contador += 1;
  const evidencia: EvidenciaSemilla = {
    ...archivo,
    numero: `${prefijo}.${contenedor.contador}`,
    estado: 'activo',
    eliminadoEn: null
  };
  contenedor.items.push(evidencia);
  return evidencia;
}

export function agregarEvidenciaSeccion(
  semilla: SemillaIncidente,
  seccion: string,
  archivo: ArchivoEvidencia
): { semilla: SemillaIncidente; evidencia: EvidenciaSemilla } {
  if (!esSeccionConEvidencias(seccion)) {
    throw new ErrorAplicacion(
      'SECCION_SIN_EVIDENCIAS',
      `La seccion ${seccion} no admite evidencias (solo ${SECCIONES_CON_EVIDENCIAS.join(', ')})`,
      400
    );
  }
  const s = clonar(semilla);
  const evidencia = agregarAContenedor(s[seccion].evidencias, PREFIJO_EVIDENCIAS_SECCION[seccion], archivo);
  return { semilla: s, evidencia };
}

export function agregarEvidenciaTaxonomia(
  semilla: SemillaIncidente,
  idUnico: string,
  archivo: ArchivoEvidencia
): { semilla: SemillaIncidente; evidencia: EvidenciaSemilla } {
  const s = clonar(semilla);
  const taxonomia = buscarTaxonomiaActiva(s, idUnico);
  const prefijo = `${PREFIJO_EVIDENCIAS_TAXONOMIA}.${taxonomia.numeroOrden}`;
  const evidencia = agregarAContenedor(taxonomia.evidencias, prefijo, archivo);
  return { semilla: s, evidencia };
}

export function listarEvidencias(
  semilla: SemillaIncidente,
  opciones: { incluirEliminadas?: boolean } = {}
): EvidenciaListada[] {
  const incluir = (ev: EvidenciaSemilla) => opciones.incluirEliminadas || ev.estado === 'activo';
  const lista: EvidenciaListada[] = [];
  for (const seccion of SECCIONES_CON_EVIDENCIAS) {
    for (const ev of semilla[seccion].evidencias.items) {
      if (incluir(ev)) lista.push({ ...ev, ubicacion: { tipo: 'seccion', seccion } });
    }
  }
  // Las evidencias de una taxonomia eliminada salen con ella.
  const porOrden = semilla.taxonomias.seleccionadas
    .filter((tax) => opciones.incluirEliminadas || tax.estado === 'activo')
    .sort((a, b) => a.numeroOrden - b.numeroOrden);
  for (const tax of porOrden) {
    for (const ev of tax.evidencias.items) {
      if (incluir(ev)) lista.push({ ...ev, ubicacion: { tipo: 'taxonomia', idUnico: tax.idUnico, codigo: tax.codigo } });
    }
  }
  return lista;
}

export function buscarEvidencia(semilla: SemillaIncidente, archivoId: string): EvidenciaListada | null {
  return listarEvidencias(semilla).find((ev) => ev.archivoId === archivoId) ?? null;
}

export function eliminarEvidencia(semilla: SemillaIncidente, archivoId: string, ahora: Date): SemillaIncidente {
  const s = clonar(semilla);
  const contenedores: ContenedorEvidencias[] = [
    ...SECCIONES_CON_EVIDENCIAS.map((seccion) => s[seccion].evidencias),
    ...s.taxonomias.seleccionadas.map((tax) => tax.evidencias)
  ];
  for (const contenedor of contenedores) {
    const evidencia = contenedor.items.find((ev) => ev.archivoId === archivoId && ev.estado === 'activo');
    if (evidencia) {
      evidencia.estado = 'eliminado';
      evidencia.eliminadoEn = ahora.toISOString();
      return s;
    }
  }
  throw new ErrorAplicacion('EVIDENCIA_NO_ENCONTRADA', 'Evidencia no encontrada', 404);
}

// ---------------------------------------------------------------------------
// Validacion y resumen
// ---------------------------------------------------------------------------

const SECCIONES: ClaveSeccion[] = [
  'informante',
  'identificacion',
  'impacto',
  'taxonomias',
  'respuesta',
  'causaRaiz',
  'lecciones',
  'seguimiento',
  'anci'
];

/** Devuelve la lista de problemas estructurales; vacia si la semilla es valida. */
export function validarEstructura(semilla: SemillaIncidente): string[] {
  const errores: string[] = [];
  if (semilla.metadatos?.versionFormato !== VERSION_FORMATO_SEMILLA) {
    errores.push(`Version de formato no soportada: ${String(semilla.metadatos?.versionFormato ?? 'desconocida')}`);
  }
  for (const clave of SECCIONES) {
    if (!semilla[clave]) errores.push(`Falta la seccion ${NUMERO_SECCION[clave]} (${clave})`);
  }
  if (errores.length) return errores;

  if (estaVacio(semilla.informante.nombreInformante)) errores.push('Falta nombreInformante en la seccion 1');
  if (estaVacio(semilla.informante.emailInformante)) errores.push('Falta emailInformante en la seccion 1');
  if (estaVacio(semilla.identificacion.titulo)) errores.push('Falta titulo en la seccion 2');
  const fecha = new Date(semilla.identificacion.fechaDeteccion);
  if (estaVacio(semilla.identificacion.fechaDeteccion) || Number.isNaN(fecha.getTime())) {
    errores.push('Falta fechaDeteccion en la seccion 2');
  }
  return errores;
}

export type ResumenTaxonomias = {
  totalActivas: number;
  totalEvidencias: number;
  taxonomias: Array<{
    idUnico: string;
    codigo: string;
    numeroOrden: number;
    justificacion: string;
    descripcionProblema: string;
    evidencias: number;
  }>;
};

export function resumenTaxonomias(semilla: SemillaIncidente): ResumenTaxonomias {
  const taxonomias = taxonomiasActivas(semilla).map((tax) => ({
    idUnico: tax.idUnico,
    codigo: tax.codigo,
    numeroOrden: tax.numeroOrden,
    justificacion: tax.justificacion,
    descripcionProblema: tax.descripcionProblema,
    evidencias: tax.evidencias.items.filter((ev) => ev.estado === 'activo').length
  }));
  return {
    totalActivas: taxonomias.length,
    totalEvidencias: taxonomias.reduce((acc, tax) => acc + tax.evidencias, 0),
    taxonomias
  };
}
