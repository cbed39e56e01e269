/**
 * Evidencias adjuntas a secciones o taxonomias de un incidente.
 *
 * El binario vive en el almacen de archivos; la semilla base guarda solo la
 * referencia (ruta, hash y metadatos). Eliminar es un borrado logico: el
 * archivo y su numero correlativo se conservan.
 */
import { createHash, randomUUID } from 'node:crypto';
import path from 'node:path';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { registrarEvidencia } from '../../compartido/observabilidad/metrics';
import { normalizarParaNombreArchivo } from '../../compartido/utilidades/texto';
import { carpetaIncidente, type AlmacenArchivos } from '../../infraestructura/archivos/almacenLocal';
import { log } from '../../infraestructura/logging/logger';
import type { ContextoUsuario } from '../modulo_autenticacion/middlewareAutenticacion';
import { obtenerSeccion } from '../modulo_taxonomias/domain/seccionesAnci';
import {
  agregarEvidenciaSeccion,
  agregarEvidenciaTaxonomia,
  buscarEvidencia,
  eliminarEvidencia,
  esSeccionConEvidencias,
  listarEvidencias
} from './domain/semilla';
import type { ArchivoEvidencia, EvidenciaListada, EvidenciaSemilla, SemillaIncidente } from './domain/tiposSemilla';
import type { ServicioIncidentes } from './servicioIncidentes';
import type { SubirEvidenciaPayload } from './validacionesIncidentes';

export const EXTENSIONES_PERMITIDAS = [
  '.pdf',
  '.doc',
  '.docx',
  '.xls',
  '.xlsx',
  '.png',
  '.jpg',
  '.jpeg',
  '.txt',
  '.csv',
  '.zip',
  '.rar',
  '.msg',
  '.eml'
] as const;

const BYTES_POR_MB = 1024 * 1024;

export type ArchivoSubido = {
  nombreOriginal: string;
  tipoMime: string;
  contenido: Buffer;
};

export function extensionPermitida(nombre: string): boolean {
  const extension = path.extname(nombre).toLowerCase();
  return EXTENSIONES_PERMITIDAS.some((permitida) => permitida === extension);
}

/** `{archivoId}_{nombre-normalizado}` conservando la extension. */
export function nombreAlmacenado(archivoId: string, nombreOriginal: string): string {
  const extension = path.extname(nombreOriginal).toLowerCase();
  const nombre = normalizarParaNombreArchivo(path.basename(nombreOriginal, path.extname(nombreOriginal)), { maxLen: 60 });
  return `${archivoId}_${nombre || 'archivo'}${extension}`;
}

function activas(items: EvidenciaSemilla[]): number {
  return items.filter((ev) => ev.estado === 'activo').length;
}

function rechazar(error: ErrorAplicacion): never {
  registrarEvidencia(false);
  throw error;
}

export class ServicioEvidencias {
  constructor(
    private readonly incidentes: ServicioIncidentes,
    private readonly almacen: AlmacenArchivos
  ) {}

  private verificarLimites(semilla: SemillaIncidente, datos: SubirEvidenciaPayload, tamanoBytes: number) {
    let codigoSeccion: string;
    let enUso: number;
    if (datos.taxonomiaId) {
      const taxonomia = semilla.taxonomias.seleccionadas.find(
        (tax) => tax.idUnico === datos.taxonomiaId && tax.estado === 'activo'
      );
      if (!taxonomia) {
        rechazar(new ErrorAplicacion('TAXONOMIA_NO_ENCONTRADA', 'Taxonomia no encontrada en el incidente', 404));
      }
      codigoSeccion = 'taxonomias';
      enUso = activas(taxonomia.evidencias.items);
    } else {
      const seccion = datos.seccion ?? '';
      if (!esSeccionConEvidencias(seccion)) {
        rechazar(new ErrorAplicacion('SECCION_SIN_EVIDENCIAS', `La seccion ${seccion} no admite evidencias`, 400));
      }
      codigoSeccion = seccion;
      enUso = activas(semilla[seccion].evidencias.items);
    }

    const config = obtenerSeccion(codigoSeccion);
    if (!config) return;
    if (config.maxArchivos > 0 && enUso >= config.maxArchivos) {
      rechazar(
        new ErrorAplicacion(
          'LIMITE_ARCHIVOS_SECCION',
          `La seccion ${config.titulo} admite hasta ${config.maxArchivos} archivos`,
          422
        )
      );
    }
    if (config.maxSizeMb > 0 && tamanoBytes > config.maxSizeMb * BYTES_POR_MB) {
      rechazar(
        new ErrorAplicacion(
          'ARCHIVO_DEMASIADO_GRANDE',
          `La seccion ${config.titulo} admite archivos de hasta ${config.maxSizeMb} MB`,
          413
        )
      );
    }
  }

  async subir(
    contexto: ContextoUsuario,
    incidenteId: string,
    archivo: ArchivoSubido | undefined,
    datos: SubirEvidenciaPayload
  ): Promise<EvidenciaSemilla> {
    if (!archivo || archivo.contenido.length === 0) {
      rechazar(new ErrorAplicacion('ARCHIVO_REQUERIDO', 'Adjunta un archivo en el campo "archivo"', 400));
    }
    if (!extensionPermitida(archivo.nombreOriginal)) {
      rechazar(
        new ErrorAplicacion(
          'EXTENSION_NO_PERMITIDA',
          `Extension no permitida; usa ${EXTENSIONES_PERMITIDAS.join(', ')}`,
          400
        )
      );
    }

    const incidente = await this.incidentes.obtener(contexto, incidenteId);
    this.verificarLimites(incidente.semillaBase, datos, archivo.contenido.length);

    const archivoId = randomUUID();
    const ruta = `${carpetaIncidente(incidente.empresaId, incidente.indiceUnico)}/evidencias/${nombreAlmacenado(
      archivoId,
      archivo.nombreOriginal
    )}`;
    const registro: ArchivoEvidencia = {
      archivoId,
      nombreOriginal: archivo.nombreOriginal,
      ruta,
      tipoMime: archivo.tipoMime || 'application/octet-stream',
      tamanoBytes: archivo.contenido.length,
      hashSha256: createHash('sha256').update(archivo.contenido).digest('hex'),
      descripcion: datos.descripcion,
      subidoPor: contexto.usuarioId,
      subidoEn: this.incidentes.reloj.now().toISOString()
    };

    const { semilla, evidencia } = datos.taxonomiaId
      ? agregarEvidenciaTaxonomia(incidente.semillaBase, datos.taxonomiaId, registro)
      : agregarEvidenciaSeccion(incidente.semillaBase, datos.seccion ?? '', registro);

    // Primero el archivo: si la escritura de la semilla falla queda un huerfano
    // en disco, nunca una referencia sin archivo.
    await this.almacen.guardar(ruta, archivo.contenido);
    await this.incidentes.guardarBase(incidente, semilla, contexto.usuarioId);
    registrarEvidencia(true);

    await this.incidentes.registrarEvento(incidente, 'evidencia_subida', contexto.usuarioId, {
      archivoId,
      numero: evidencia.numero,
      nombreOriginal: evidencia.nombreOriginal,
      tamanoBytes: evidencia.tamanoBytes
    });
    log('info', 'Evidencia subida', { incidenteId: incidente.id, archivoId, numero: evidencia.numero });
    return evidencia;
  }

  async listar(contexto: ContextoUsuario, incidenteId: string, incluirEliminadas = false): Promise<EvidenciaListada[]> {
    const incidente = await this.incidentes.obtener(contexto, incidenteId);
    return listarEvidencias(incidente.semillaBase, { incluirEliminadas });
  }

  async descargar(
    contexto: ContextoUsuario,
    incidenteId: string,
    archivoId: string
  ): Promise<{ evidencia: EvidenciaListada; contenido: Buffer }> {
    const incidente = await this.incidentes.obtener(contexto, incidenteId);
    const evidencia = buscarEvidencia(incidente.semillaBase, archivoId);
    if (!evidencia) throw new ErrorAplicacion('EVIDENCIA_NO_ENCONTRADA', 'Evidencia no encontrada', 404);
    const contenido = await this.almacen.leer(evidencia.ruta);
    return { evidencia, contenido };
  }

  async eliminar(contexto: ContextoUsuario, incidenteId: string, archivoId: string): Promise<void> {
    const incidente = await this.incidentes.obtener(contexto, incidenteId);
    const semilla = eliminarEvidencia(incidente.semillaBase, archivoId, this.incidentes.reloj.now());
    await this.incidentes.guardarBase(incidente, semilla, contexto.usuarioId);
    await this.incidentes.registrarEvento(incidente, 'evidencia_eliminada', contexto.usuarioId, { archivoId });
  }
}
