/**
 * Tipos internos del modulo de empresas.
 */
import type { TipoEmpresa } from '../../modulo_incidentes/domain/plazos';

export type Empresa = {
  id: string;
  razonSocial: string;
  rut: string;
  tipoEmpresa: TipoEmpresa;
  sectorEsencial: string;
  correoContacto: string;
  activa: boolean;
  creadoEn: Date;
  actualizadoEn: Date;
};

export type NuevaEmpresa = Omit<Empresa, 'id' | 'activa' | 'creadoEn' | 'actualizadoEn'>;

export type CambiosEmpresa = Partial<Omit<Empresa, 'id' | 'rut' | 'creadoEn' | 'actualizadoEn'>>;

export type FiltroEmpresas = {
  /** Restringe a estos ids (usuarios acotados a sus empresas). */
  ids?: string[];
  incluirInactivas?: boolean;
};

export interface RepositorioEmpresas {
  listar(filtro: FiltroEmpresas): Promise<Empresa[]>;
  buscarPorId(id: string): Promise<Empresa | null>;
  buscarPorRut(rut: string): Promise<Empresa | null>;
  crear(datos: NuevaEmpresa): Promise<Empresa>;
  actualizar(id: string, cambios: CambiosEmpresa): Promise<Empresa | null>;
}
