/**
 * Modelo InformeAnci: un registro por cada `.docx` generado.
 */
import { Schema, model, models, type Model } from 'mongoose';
import { TIPOS_INFORME } from '../modulo_incidentes/domain/plazos';
import type { NuevoInformeAnci } from './shared/tiposInformes';

export type DocInformeAnci = NuevoInformeAnci;

const InformeAnciSchema = new Schema<DocInformeAnci>(
  {
    incidenteId: { type: String, required: true },
    empresaId: { type: String, required: true },
    tipoInforme: { type: String, enum: TIPOS_INFORME, required: true },
    nombreArchivo: { type: String, required: true },
    ruta: { type: String, required: true },
    tamanoBytes: { type: Number, required: true },
    hashSha256: { type: String, required: true },
    versionSemilla: { type: Number, required: true },
    usoPlantilla: { type: Boolean, default: false },
    marcadoresDesconocidos: { type: [String], default: [] },
    generadoPor: { type: String, required: true },
    generadoEn: { type: Date, required: true }
  },
  { collection: 'informes_anci' }
);

InformeAnciSchema.index({ incidenteId: 1, generadoEn: -1 });

export const InformeAnci: Model<DocInformeAnci> =
  models.InformeAnci ?? model<DocInformeAnci>('InformeAnci', InformeAnciSchema);
