/**
 * Modelo Usuario.
 */
import { Schema, model, models, type Model } from 'mongoose';

export type DocUsuario = {
  correo: string;
  nombre: string;
  hashContrasena: string;
  roles: string[];
  empresas: string[];
  activo: boolean;
  ultimoAcceso?: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

const UsuarioSchema = new Schema<DocUsuario>(
  {
    correo: { type: String, required: true, unique: true, lowercase: true, trim: true },
    nombre: { type: String, required: true, trim: true },
    hashContrasena: { type: String, required: true },
    roles: { type: [String], default: ['cliente'] },
    empresas: { type: [String], default: [] },
    activo: { type: Boolean, default: true },
    ultimoAcceso: { type: Date, default: null }
  },
  { timestamps: true, collection: 'usuarios' }
);

export const Usuario: Model<DocUsuario> = models.Usuario ?? model<DocUsuario>('Usuario', UsuarioSchema);
