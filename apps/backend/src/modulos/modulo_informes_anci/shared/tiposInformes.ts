/**
 * Tipos del historial de informes ANCI generados.
 */
import type { TipoInforme } from '../../modulo_incidentes/domain/plazos';

export type InformeAnci = {
  id: string;
  incidenteId: string;
  empresaId: string;
  tipoInforme: TipoInforme;
  nombreArchivo: string;
  ruta: string;
  tamanoBytes: number;
  hashSha256: string;
  versionSemilla: number;
  usoPlantilla: boolean;
  marcadoresDesconocidos: string[];
  generadoPor: string;
  generadoEn: Date;
};

export type NuevoInformeAnci = Omit<InformeAnci, 'id'>;

export interface RepositorioInformes {
  registrar(informe: NuevoInformeAnci): Promise<InformeAnci>;
  buscarPorId(id: string): Promise<InformeAnci | null>;
  listarPorIncidente(incidenteId: string): Promise<InformeAnci[]>;
}
