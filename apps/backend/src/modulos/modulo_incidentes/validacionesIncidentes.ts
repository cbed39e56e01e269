/**
 * Validaciones de incidentes y de cambios sobre la semilla.
 */
import { z } from 'zod';
import {
  esquemaFechaIso,
  esquemaObjectId,
  esquemaTextoCorto,
  esquemaTextoLargo,
  esquemaTipoEmpresa,
  esquemaTipoInforme
} from '../../compartido/validaciones/esquemas';
import { CRITICIDADES } from './domain/tiposSemilla';
import { ESTADOS_INCIDENTE } from './shared/tiposIncidentes';

const listaTexto = z.array(esquemaTextoCorto).max(200);
const fechaOpcional = esquemaFechaIso.nullable();
const correoOVacio = z.string().trim().email().or(z.literal(''));
const esquemaCriticidad = z.enum(CRITICIDADES);

const esquemaInformante = z
  .object({
    razonSocial: esquemaTextoCorto,
    rut: esquemaTextoCorto,
    tipoEntidad: esquemaTipoEmpresa.or(z.literal('')),
    sectorEsencial: esquemaTextoCorto,
    nombreInformante: esquemaTextoCorto,
    cargoInformante: esquemaTextoCorto,
    emailInformante: correoOVacio,
    telefono24x7: esquemaTextoCorto,
    emailOficialSeguridad: correoOVacio
  })
  .partial()
  .strict();

const esquemaIdentificacion = z
  .object({
    titulo: esquemaTextoCorto.min(1),
    descripcion: esquemaTextoLargo,
    fechaDeteccion: esquemaFechaIso,
    fechaOcurrencia: fechaOpcional,
    criticidad: esquemaCriticidad.or(z.literal('')),
    origen: esquemaTextoCorto,
    sistemasAfectados: listaTexto,
    serviciosInterrumpidos: esquemaTextoLargo,
    servicioEsencialAfectado: z.boolean(),
    alcanceGeografico: esquemaTextoCorto,
    incidenteEnCurso: z.boolean().nullable(),
    contencionAplicada: z.boolean().nullable(),
    descripcionEstadoActual: esquemaTextoLargo
  })
  .partial()
  .strict();

const esquemaImpacto = z
  .object({
    usuariosAfectados: z.number().int().min(0).nullable(),
    tipoUsuariosAfectados: esquemaTextoCorto,
    impactoOperativo: esquemaTextoLargo,
    impactoEconomico: esquemaTextoLargo,
    impactoReputacional: esquemaTextoLargo,
    datosComprometidos: z.boolean().nullable()
  })
  .partial()
  .strict();

const esquemaRespuesta = z
  .object({
    accionesInmediatas: esquemaTextoLargo,
    medidasContencion: esquemaTextoLargo,
    sistemasAislados: listaTexto,
    solicitarApoyoCsirt: z.boolean(),
    tipoApoyoCsirt: esquemaTextoCorto
  })
  .partial()
  .strict();

const esquemaCausaRaiz = z
  .object({
    analisisPreliminar: esquemaTextoLargo,
    causaIdentificada: esquemaTextoLargo,
    vectorAtaque: esquemaTextoCorto,
    vulnerabilidadExplotada: esquemaTextoCorto,
    factoresContribuyentes: esquemaTextoLargo
  })
  .partial()
  .strict();

const esquemaLecciones = z
  .object({
    leccionesAprendidas: esquemaTextoLargo,
    accionesCorrectivas: esquemaTextoLargo,
    accionesPreventivas: esquemaTextoLargo,
    planMejora: esquemaTextoLargo
  })
  .partial()
  .strict();

const esquemaSeguimiento = z
  .object({
    responsable: esquemaTextoCorto,
    proximaRevision: fechaOpcional,
    observaciones: esquemaTextoLargo,
    fechaCierre: fechaOpcional
  })
  .partial()
  .strict();

const esquemaAnci = z
  .object({
    folioAnci: esquemaTextoCorto,
    fechaDeclaracion: fechaOpcional,
    tipoAmenaza: esquemaTextoCorto,
    volumenDatosGb: z.number().min(0).nullable(),
    iocs: z
      .object({
        ips: listaTexto,
        hashes: listaTexto,
        dominios: listaTexto,
        urls: listaTexto,
        cuentasComprometidas: listaTexto
      })
      .partial()
      .strict(),
    planAccion: z
      .object({
        programaRecuperacion: esquemaTextoLargo,
        responsablePlan: esquemaTextoCorto,
        recursosAsignados: esquemaTextoLargo,
        fechaImplementacion: fechaOpcional
      })
      .partial()
      .strict(),
    impactoEconomico: z
      .object({
        costosRecuperacion: z.number().min(0).nullable(),
        perdidasOperacionales: z.number().min(0).nullable(),
        moneda: z.string().trim().min(3).max(3)
      })
      .partial()
      .strict(),
    coordinaciones: z
      .object({
        notificoCsirt: z.boolean(),
        notificoPolicia: z.boolean(),
        notificoFiscalia: z.boolean(),
        notificoTitulares: z.boolean(),
        otrasEntidades: esquemaTextoLargo
      })
      .partial()
      .strict()
  })
  .partial()
  .strict();

export const esquemaCambiosSemilla = z
  .object({
    informante: esquemaInformante,
    identificacion: esquemaIdentificacion,
    impacto: esquemaImpacto,
    respuesta: esquemaRespuesta,
    causaRaiz: esquemaCausaRaiz,
    lecciones: esquemaLecciones,
    seguimiento: esquemaSeguimiento,
    anci: esquemaAnci
  })
  .partial()
  .strict();

export const esquemaCrearIncidente = z
  .object({
    empresaId: esquemaObjectId,
    titulo: esquemaTextoCorto.min(1),
    descripcion: esquemaTextoLargo.default(''),
    fechaDeteccion: esquemaFechaIso,
    fechaOcurrencia: fechaOpcional.optional(),
    criticidad: esquemaCriticidad.optional(),
    servicioEsencialAfectado: z.boolean().default(false),
    semilla: esquemaCambiosSemilla.default({})
  })
  .strict();

export type CrearIncidentePayload = z.infer<typeof esquemaCrearIncidente>;

export const esquemaGuardarEdicion = z
  .object({
    cambios: esquemaCambiosSemilla,
    versionEsperada: z.number().int().positive().optional()
  })
  .strict();

export type GuardarEdicionPayload = z.infer<typeof esquemaGuardarEdicion>;

export const esquemaCambiarEstado = z.object({ estado: z.enum(ESTADOS_INCIDENTE) }).strict();

export type CambiarEstadoPayload = z.infer<typeof esquemaCambiarEstado>;

export const esquemaAgregarTaxonomia = z
  .object({
    codigo: z.string().trim().toUpperCase().min(1).max(40),
    justificacion: esquemaTextoLargo.refine((v) => v.trim().length > 0, { message: 'Justificacion requerida' }),
    descripcionProblema: esquemaTextoLargo.default('')
  })
  .strict();

export type AgregarTaxonomiaPayload = z.infer<typeof esquemaAgregarTaxonomia>;

export const esquemaActualizarTaxonomia = z
  .object({
    justificacion: esquemaTextoLargo.optional(),
    descripcionProblema: esquemaTextoLargo.optional()
  })
  .strict()
  .refine((datos) => datos.justificacion !== undefined || datos.descripcionProblema !== undefined, {
    message: 'Sin cambios'
  });

export type ActualizarTaxonomiaPayload = z.infer<typeof esquemaActualizarTaxonomia>;

export const esquemaReporteEnviado = z
  .object({
    tipoInforme: esquemaTipoInforme,
    enviadoEn: esquemaFechaIso.optional(),
    folioAnci: esquemaTextoCorto.optional()
  })
  .strict();

export type ReporteEnviadoPayload = z.infer<typeof esquemaReporteEnviado>;

/** Campos de texto que acompanan al archivo en el multipart. */
export const esquemaSubirEvidencia = z
  .object({
    seccion: z.string().trim().min(1).optional(),
    taxonomiaId: z.string().trim().uuid().optional(),
    descripcion: esquemaTextoLargo.default('')
  })
  .strict()
  .refine((datos) => (datos.seccion === undefined) !== (datos.taxonomiaId === undefined), {
    message: 'Indica seccion o taxonomiaId (solo uno)'
  });

export type SubirEvidenciaPayload = z.infer<typeof esquemaSubirEvidencia>;

export const esquemaConsultaIncidentes = z
  .object({
    empresaId: esquemaObjectId.optional(),
    estado: z.enum(ESTADOS_INCIDENTE).optional()
  })
  .strict();

export type ConsultaIncidentes = z.infer<typeof esquemaConsultaIncidentes>;

export const esquemaConsultaValidacion = z.object({ tipoInforme: esquemaTipoInforme }).strict();

export type ConsultaValidacion = z.infer<typeof esquemaConsultaValidacion>;
