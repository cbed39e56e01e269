/**
 * Modelo Incidente.
 *
 * Las tres semillas se guardan como documentos embebidos (Mixed): la original
 * no cambia nunca, la base es la vigente y la de edicion es opcional.
 */
import { Schema, model, models, type Model } from 'mongoose';
import { TIPOS_INFORME } from './domain/plazos';
import { CRITICIDADES, type SemillaIncidente } from './domain/tiposSemilla';
import { ESTADOS_INCIDENTE, type EstadoIncidente, type ReporteEnviado } from './shared/tiposIncidentes';

export type DocIncidente = {
  indiceUnico: string;
  empresaId: string;
  titulo: string;
  criticidad: string;
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
  createdAt: Date;
  updatedAt: Date;
};

const ReporteEnviadoSchema = new Schema<ReporteEnviado>(
  {
    tipoInforme: { type: String, enum: TIPOS_INFORME, required: true },
    enviadoEn: { type: Date, required: true },
    folioAnci: { type: String, default: '' },
    registradoPor: { type: String, required: true },
    registradoEn: { type: Date, required: true }
  },
  { _id: false }
);

const IncidenteSchema = new Schema<DocIncidente>(
  {
    indiceUnico: { type: String, required: true, unique: true },
    empresaId: { type: String, required: true, index: true },
    titulo: { type: String, required: true },
    criticidad: { type: String, enum: [...CRITICIDADES, ''], default: '' },
    estado: { type: String, enum: ESTADOS_INCIDENTE, default: 'abierto' },
    fechaDeteccion: { type: Date, required: true },
    servicioEsencialAfectado: { type: Boolean, default: false },
    semillaOriginal: { type: Schema.Types.Mixed, required: true },
    semillaBase: { type: Schema.Types.Mixed, required: true },
    semillaEdicion: { type: Schema.Types.Mixed, default: null },
    reportesEnviados: { type: [ReporteEnviadoSchema], default: [] },
    activo: { type: Boolean, default: true },
    eliminadoEn: { type: Date, default: null },
    creadoPor: { type: String, required: true }
  },
  { timestamps: true, collection: 'incidentes', minimize: false }
);

IncidenteSchema.index({ empresaId: 1, estado: 1, activo: 1 });

export const Incidente: Model<DocIncidente> = models.Incidente ?? model<DocIncidente>('Incidente', IncidenteSchema);

/** Correlativos atomicos por nombre (`findOneAndUpdate` + `$inc`). */
type DocContador = { _id: string; valor: number };

const ContadorSchema = new Schema<DocContador>(
  {
    _id: { type: String, required: true },
    valor: { type: Number, default: 0 }
  },
  { collection: 'contadores', versionKey: false }
);

export const Contador: Model<DocContador> = models.Contador ?? model<DocContador>('Contador', ContadorSchema);
