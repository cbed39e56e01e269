/**
 * Informe ANCI estructurado a partir de la semilla base.
 *
 * Cada tipo extiende al anterior:
 * alerta → preliminar → completo → final, y preliminar → plan de accion.
 * Los valores son texto listo para mostrar; un campo sin dato queda vacio.
 */
import { formatearFechaInforme } from '../../../compartido/utilidades/fechas';
import { truncar } from '../../../compartido/utilidades/texto';
import { NOMBRES_INFORME, type TipoInforme } from '../../modulo_incidentes/domain/plazos';
import { listarEvidencias, taxonomiasActivas } from '../../modulo_incidentes/domain/semilla';
import type { EvidenciaListada, SemillaIncidente } from '../../modulo_incidentes/domain/tiposSemilla';
import { obtenerTaxonomia } from '../../modulo_taxonomias/domain/catalogoTaxonomias';

export const LARGO_DESCRIPCION_ALERTA = 500;
const MAX_TAXONOMIAS_ALERTA = 3;

export type CampoInforme = { etiqueta: string; valor: string };

export type SeccionInforme = {
  clave: string;
  titulo: string;
  campos: CampoInforme[];
};

export type AdjuntoInforme = {
  numero: string;
  nombreOriginal: string;
  ubicacion: string;
  descripcion: string;
  subidoEn: string;
  hashSha256: string;
};

export type ReferenciaInforme = {
  tipoReporte: string;
  idInterno: string;
  folioAnci: string;
  fechaGeneracion: string;
  plazoLimite: string;
};

export type InformeEstructurado = {
  tipo: TipoInforme;
  titulo: string;
  referencia: ReferenciaInforme;
  secciones: SeccionInforme[];
  archivosAdjuntos: AdjuntoInforme[];
};

/** Evento de la cronologia del informe final. */
export type EventoCronologia = {
  accion: string;
  usuarioId: string;
  creadoEn: Date;
};

export type ContextoInforme = {
  semilla: SemillaIncidente;
  estadoIncidente: string;
  eventos: EventoCronologia[];
  plazoLimite: Date | null;
  generadoEn: Date;
  zonaHoraria: string;
};

const ETIQUETAS_ESTADO: Record<string, string> = {
  abierto: 'Abierto',
  en_investigacion: 'En investigación',
  contenido: 'Contenido',
  cerrado: 'Cerrado'
};

export function etiquetaEstado(estado: string): string {
  return ETIQUETAS_ESTADO[estado] ?? estado;
}

function siNo(valor: boolean | null): string {
  if (valor === null) return '';
  return valor ? 'Sí' : 'No';
}

function lista(valores: string[]): string {
  return valores.map((v) => v.trim()).filter(Boolean).join(', ');
}

function numero(valor: number | null): string {
  return valor === null ? '' : String(valor);
}

function campo(etiqueta: string, valor: string): CampoInforme {
  return { etiqueta, valor };
}

export function codigosTaxonomia(semilla: SemillaIncidente): string[] {
  return [...taxonomiasActivas(semilla)].sort((a, b) => a.numeroOrden - b.numeroOrden).map((tax) => tax.codigo);
}

/** Hasta tres codigos, o `Sin clasificar` si no hay taxonomias activas. */
export function taxonomiaInicial(semilla: SemillaIncidente): string {
  const codigos = codigosTaxonomia(semilla).slice(0, MAX_TAXONOMIAS_ALERTA);
  return codigos.length ? codigos.join(', ') : 'Sin clasificar';
}

function ubicacionAdjunto(ev: EvidenciaListada): string {
  return ev.ubicacion.tipo === 'seccion' ? ev.ubicacion.seccion : `taxonomia ${ev.ubicacion.codigo}`;
}

function adjuntos(contexto: ContextoInforme, soloAlerta: boolean): AdjuntoInforme[] {
  return listarEvidencias(contexto.semilla)
    .filter((ev) => {
      if (!soloAlerta) return true;
      // Secciones 1, 2 y 5: solo identificacion y respuesta admiten archivos.
      return ev.ubicacion.tipo === 'seccion' && (ev.ubicacion.seccion === 'identificacion' || ev.ubicacion.seccion === 'respuesta');
    })
    .map((ev) => ({
      numero: ev.numero,
      nombreOriginal: ev.nombreOriginal,
      ubicacion: ubicacionAdjunto(ev),
      descripcion: ev.descripcion,
      subidoEn: formatearFechaInforme(ev.subidoEn, contexto.zonaHoraria),
      hashSha256: ev.hashSha256
    }));
}

function seccionesAlerta(contexto: ContextoInforme): SeccionInforme[] {
  const { semilla, zonaHoraria } = contexto;
  const { informante, identificacion, respuesta } = semilla;
  return [
    {
      clave: 'identificacion_entidad',
      titulo: 'Identificación de la entidad',
      campos: [
        campo('Razón social', informante.razonSocial),
        campo('RUT', informante.rut),
        campo('Tipo de entidad', informante.tipoEntidad),
        campo('Sector esencial', informante.sectorEsencial)
      ]
    },
    {
      clave: 'datos_contacto',
      titulo: 'Datos de contacto',
      campos: [
        campo('Nombre del reportante', informante.nombreInformante),
        campo('Cargo', informante.cargoInformante),
        campo('Teléfono 24/7', informante.telefono24x7),
        campo('Email oficial de seguridad', informante.emailOficialSeguridad || informante.emailInformante)
      ]
    },
    {
      clave: 'datos_incidente',
      titulo: 'Datos del incidente',
      campos: [
        campo('Fecha y hora de detección', formatearFechaInforme(identificacion.fechaDeteccion, zonaHoraria)),
        campo(
          'Fecha y hora estimada de inicio',
          formatearFechaInforme(identificacion.fechaOcurrencia ?? identificacion.fechaDeteccion, zonaHoraria)
        ),
        campo('Descripción breve', truncar(identificacion.descripcion, LARGO_DESCRIPCION_ALERTA)),
        campo('Taxonomía inicial', taxonomiaInicial(semilla)),
        campo('Sistemas afectados', lista(identificacion.sistemasAfectados)),
        campo('Servicios interrumpidos', identificacion.serviciosInterrumpidos),
        campo('Alcance geográfico', identificacion.alcanceGeografico)
      ]
    },
    {
      clave: 'estado_actual',
      titulo: 'Estado actual',
      campos: [
        campo('Estado del incidente', etiquetaEstado(contexto.estadoIncidente)),
        campo('Incidente en curso', siNo(identificacion.incidenteEnCurso)),
        campo('Contención aplicada', siNo(identificacion.contencionAplicada)),
        campo('Descripción del estado', identificacion.descripcionEstadoActual)
      ]
    },
    {
      clave: 'acciones_inmediatas',
      titulo: 'Acciones inmediatas',
      campos: [
        campo('Medidas de contención', respuesta.medidasContencion),
        campo('Sistemas aislados', lista(respuesta.sistemasAislados)),
        campo('Requiere asistencia CSIRT', siNo(respuesta.solicitarApoyoCsirt)),
        campo('Tipo de apoyo requerido', respuesta.tipoApoyoCsirt)
      ]
    }
  ];
}

function seccionesPreliminar(contexto: ContextoInforme): SeccionInforme[] {
  const { impacto, identificacion, causaRaiz, respuesta, anci } = contexto.semilla;
  return [
    ...seccionesAlerta(contexto),
    {
      clave: 'gravedad_impacto',
      titulo: 'Gravedad e impacto',
      campos: [
        campo('Nivel de criticidad', identificacion.criticidad),
        campo('Servicio esencial afectado', siNo(identificacion.servicioEsencialAfectado)),
        campo('Usuarios afectados', numero(impacto.usuariosAfectados)),
        campo('Tipo de usuarios afectados', impacto.tipoUsuariosAfectados),
        campo('Impacto operativo', impacto.impactoOperativo),
        campo('Impacto reputacional', impacto.impactoReputacional),
        campo('Datos comprometidos', siNo(impacto.datosComprometidos)),
        campo('Volumen de datos comprometidos (GB)', numero(anci.volumenDatosGb))
      ]
    },
    {
      clave: 'analisis_tecnico',
      titulo: 'Análisis técnico',
      campos: [
        campo('Descripción completa', identificacion.descripcion),
        campo('Origen del incidente', identificacion.origen),
        campo('Vector de ataque', causaRaiz.vectorAtaque),
        campo('Tipo de amenaza', anci.tipoAmenaza),
        campo('Acciones inmediatas', respuesta.accionesInmediatas)
      ]
    },
    {
      clave: 'indicadores_compromiso',
      titulo: 'Indicadores de compromiso',
      campos: [
        campo('Direcciones IP', lista(anci.iocs.ips)),
        campo('Hashes', lista(anci.iocs.hashes)),
        campo('Dominios', lista(anci.iocs.dominios)),
        campo('URLs', lista(anci.iocs.urls)),
        campo('Cuentas comprometidas', lista(anci.iocs.cuentasComprometidas))
      ]
    },
    {
      clave: 'causa_preliminar',
      titulo: 'Análisis preliminar de causa',
      campos: [
        campo('Análisis preliminar', causaRaiz.analisisPreliminar),
        campo('Vulnerabilidad explotada', causaRaiz.vulnerabilidadExplotada)
      ]
    },
    {
      clave: 'coordinaciones_externas',
      titulo: 'Coordinaciones externas',
      campos: [
        campo('Notificó a CSIRT', siNo(anci.coordinaciones.notificoCsirt)),
        campo('Denuncia policial', siNo(anci.coordinaciones.notificoPolicia)),
        campo('Notificó a Fiscalía', siNo(anci.coordinaciones.notificoFiscalia)),
        campo('Notificó a titulares de datos', siNo(anci.coordinaciones.notificoTitulares)),
        campo('Otras entidades', anci.coordinaciones.otrasEntidades)
      ]
    }
  ];
}

function seccionTaxonomias(semilla: SemillaIncidente): SeccionInforme {
  const campos = [...taxonomiasActivas(semilla)]
    .sort((a, b) => a.numeroOrden - b.numeroOrden)
    .flatMap((tax) => {
      const catalogo = obtenerTaxonomia(tax.codigo);
      const nombre = catalogo ? `${tax.codigo} (${catalogo.categoria})` : tax.codigo;
      return [
        campo(`4.${tax.numeroOrden} ${nombre}`, tax.justificacion),
        campo(`4.${tax.numeroOrden} Descripción del problema`, tax.descripcionProblema)
      ];
    });
  return { clave: 'detalle_taxonomias', titulo: 'Detalle de taxonomías', campos };
}

function seccionesCompleto(contexto: ContextoInforme): SeccionInforme[] {
  return [...seccionesPreliminar(contexto), seccionTaxonomias(contexto.semilla)];
}

function seccionesPlanAccion(contexto: ContextoInforme): SeccionInforme[] {
  const { planAccion } = contexto.semilla.anci;
  return [
    ...seccionesPreliminar(contexto),
    {
      clave: 'plan_recuperacion',
      titulo: 'Plan de recuperación',
      campos: [
        campo('Programa de recuperación', planAccion.programaRecuperacion),
        campo('Responsable del plan', planAccion.responsablePlan),
        campo('Recursos asignados', planAccion.recursosAsignados),
        campo('Fecha de implementación', formatearFechaInforme(planAccion.fechaImplementacion, contexto.zonaHoraria))
      ]
    }
  ];
}

function seccionesFinal(contexto: ContextoInforme): SeccionInforme[] {
  const { causaRaiz, lecciones, anci, seguimiento } = contexto.semilla;
  return [
    ...seccionesCompleto(contexto),
    {
      clave: 'causa_raiz',
      titulo: 'Causa raíz',
      campos: [
        campo('Causa identificada', causaRaiz.causaIdentificada),
        campo('Factores contribuyentes', causaRaiz.factoresContribuyentes)
      ]
    },
    {
      clave: 'lecciones_aprendidas',
      titulo: 'Lecciones aprendidas',
      campos: [
        campo('Lecciones aprendidas', lecciones.leccionesAprendidas),
        campo('Acciones correctivas', lecciones.accionesCorrectivas),
        campo('Acciones preventivas', lecciones.accionesPreventivas),
        campo('Plan de mejora', lecciones.planMejora)
      ]
    },
    {
      clave: 'impacto_economico',
      titulo: 'Impacto económico',
      campos: [
        campo('Costos de recuperación', numero(anci.impactoEconomico.costosRecuperacion)),
        campo('Pérdidas operacionales', numero(anci.impactoEconomico.perdidasOperacionales)),
        campo('Moneda', anci.impactoEconomico.moneda),
        campo('Fecha de cierre', formatearFechaInforme(seguimiento.fechaCierre, contexto.zonaHoraria))
      ]
    },
    {
      clave: 'cronologia',
      titulo: 'Cronología',
      campos: contexto.eventos.map((ev) =>
        campo(formatearFechaInforme(ev.creadoEn, contexto.zonaHoraria), `${ev.accion} (${ev.usuarioId})`)
      )
    }
  ];
}

const CONSTRUCTORES: Record<TipoInforme, (contexto: ContextoInforme) => SeccionInforme[]> = {
  alerta_temprana: seccionesAlerta,
  informe_preliminar: seccionesPreliminar,
  informe_completo: seccionesCompleto,
  plan_accion: seccionesPlanAccion,
  informe_final: seccionesFinal
};

export function construirInformeEstructurado(tipo: TipoInforme, contexto: ContextoInforme): InformeEstructurado {
  const { semilla } = contexto;
  return {
    tipo,
    titulo: `${NOMBRES_INFORME[tipo]}: ${semilla.identificacion.titulo}`,
    referencia: {
      tipoReporte: NOMBRES_INFORME[tipo],
      idInterno: semilla.metadatos.indiceUnico,
      folioAnci: semilla.anci.folioAnci,
      fechaGeneracion: formatearFechaInforme(contexto.generadoEn, contexto.zonaHoraria),
      plazoLimite: formatearFechaInforme(contexto.plazoLimite, contexto.zonaHoraria)
    },
    secciones: CONSTRUCTORES[tipo](contexto),
    archivosAdjuntos: adjuntos(contexto, tipo === 'alerta_temprana')
  };
}
