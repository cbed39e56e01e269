/**
 * Almacenamiento de evidencias e informes generados.
 *
 * Contrato:
 * - Las rutas son relativas a la raiz del almacen (`ARCHIVOS_DIR`) y usan `/`.
 * - `guardar` crea las carpetas intermedias (mkdir -p).
 * - Una ruta que escape de la raiz (`..`, absoluta) se rechaza.
 *
 * Nota operativa:
 * - En despliegue Docker, normalmente se monta `data/` como volumen para persistencia.
 */
import { promises as fs } from 'fs';
import path from 'path';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';

export interface AlmacenArchivos {
  guardar(rutaRelativa: string, contenido: Buffer): Promise<void>;
  leer(rutaRelativa: string): Promise<Buffer>;
}

export class AlmacenLocal implements AlmacenArchivos {
  constructor(private readonly raiz: string) {}

  resolver(rutaRelativa: string): string {
    const raiz = path.resolve(this.raiz);
    const completa = path.resolve(raiz, rutaRelativa);
    if (path.isAbsolute(rutaRelativa) || !completa.startsWith(raiz + path.sep)) {
      throw new ErrorAplicacion('RUTA_INVALIDA', 'Ruta de archivo fuera del almacen', 400);
    }
    return completa;
  }

  async guardar(rutaRelativa: string, contenido: Buffer): Promise<void> {
    const destino = this.resolver(rutaRelativa);
    await fs.mkdir(path.dirname(destino), { recursive: true });
    await fs.writeFile(destino, contenido);
  }

  async leer(rutaRelativa: string): Promise<Buffer> {
    const origen = this.resolver(rutaRelativa);
    try {
      return await fs.readFile(origen);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new ErrorAplicacion('ARCHIVO_NO_ENCONTRADO', 'Archivo no encontrado en el almacen', 404);
      }
      throw error;
    }
  }
}

/** `empresa_{empresaId}/incidente_{indiceUnico}` */
export function carpetaIncidente(empresaId: string, indiceUnico: string): string {
  return `empresa_${empresaId}/incidente_${indiceUnico}`;
}
