/**
 * Modelo Empresa (OIV / PSE / AMBAS).
 */
import { Schema, model, models, type Model } from 'mongoose';
import { TIPOS_EMPRESA, type TipoEmpresa } from '../modulo_incidentes/domain/plazos';
import { normalizarRut } from '../../compartido/utilidades/rut';

export type DocEmpresa = {
  razonSocial: string;
  rut: string;
  tipoEmpresa: TipoEmpresa;
  sectorEsencial: string;
  correoContacto: string;
  activa: boolean;
  createdAt: Date;
  updatedAt: Date;
};

const EmpresaSchema = new Schema<DocEmpresa>(
  {
    razonSocial: { type: String, required: true, trim: true },
    rut: { type: String, required: true, unique: true, set: normalizarRut },
    tipoEmpresa: { type: String, enum: TIPOS_EMPRESA, required: true },
    sectorEsencial: { type: String, default: '' },
    correoContacto: { type: String, default: '' },
    activa: { type: Boolean, default: true }
  },
  { timestamps: true, collection: 'empresas' }
);

export const Empresa: Model<DocEmpresa> = models.Empresa ?? model<DocEmpresa>('Empresa', EmpresaSchema);
