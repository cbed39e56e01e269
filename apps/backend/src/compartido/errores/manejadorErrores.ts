/**
 * Middleware de manejo de errores para el API.
 *
 * Contrato:
 * - Si se lanza/propaga `ErrorAplicacion`, se serializa tal cual (codigo/estado/detalles).
 * - Para errores no esperados, se registra (excepto en tests) y se devuelve 500.
 *
 * Nota: el formato del envelope de error es parte del contrato publico del API.
 */
import type { NextFunction, Request, Response } from 'express';
import { MulterError } from 'multer';
import { ErrorAplicacion } from './errorAplicacion';
import { logError } from '../../infraestructura/logging/logger';

function propiedad(error: unknown, clave: string): unknown {
  if (typeof error !== 'object' || error === null || !(clave in error)) return undefined;
  return Reflect.get(error, clave);
}

function esErrorIdInvalido(error: unknown): boolean {
  const nombreError = propiedad(error, 'name');
  return nombreError === 'CastError' || nombreError === 'BSONError' || nombreError === 'BSONTypeError';
}

function esClaveDuplicada(error: unknown): boolean {
  return propiedad(error, 'code') === 11000;
}

function obtenerStatusYTipo(error: unknown): { status: unknown; type: unknown } {
  return {
    status: propiedad(error, 'status') ?? propiedad(error, 'statusCode'),
    type: propiedad(error, 'type')
  };
}

function esPayloadDemasiadoGrande(error: unknown): boolean {
  const { status, type } = obtenerStatusYTipo(error);
  return status === 413 || type === 'entity.too.large';
}

function esJsonMalformado(error: unknown): boolean {
  const { status, type } = obtenerStatusYTipo(error);
  return status === 400 && type === 'entity.parse.failed';
}

function idSolicitud(res: Response): string | undefined {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : undefined;
}

function responderErrorSimple(res: Response, status: number, codigo: string, mensaje: string) {
  res.status(status).json({
    error: {
      codigo,
      mensaje
    }
  });
}

export function manejadorErrores(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  void _next;

  // IDs malformados u otros errores de casteo (p. ej. CastError/BSONError).
  if (esErrorIdInvalido(error)) {
    responderErrorSimple(res, 400, 'DATOS_INVALIDOS', 'Id invalido');
    return;
  }

  if (esPayloadDemasiadoGrande(error)) {
    responderErrorSimple(res, 413, 'PAYLOAD_DEMASIADO_GRANDE', 'Payload demasiado grande');
    return;
  }

  if (esJsonMalformado(error)) {
    responderErrorSimple(res, 400, 'JSON_INVALIDO', 'El cuerpo no es JSON valido');
    return;
  }

  // multer: limites de archivo o campo inesperado.
  if (error instanceof MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      responderErrorSimple(res, 413, 'ARCHIVO_DEMASIADO_GRANDE', 'El archivo excede el tamaño permitido');
      return;
    }
    responderErrorSimple(res, 400, 'ARCHIVO_INVALIDO', error.message);
    return;
  }

  if (esClaveDuplicada(error)) {
    responderErrorSimple(res, 409, 'REGISTRO_DUPLICADO', 'Ya existe un registro con esos datos');
    return;
  }

  if (error instanceof ErrorAplicacion) {
    if (error.estadoHttp >= 500 && process.env.NODE_ENV !== 'test') {
      logError('Error controlado 5xx en request', error, {
        requestId: idSolicitud(res),
        route: req.path,
        method: req.method,
        status: error.estadoHttp,
        codigo: error.codigo
      });
    }

    res.status(error.estadoHttp).json({
      error: {
        codigo: error.codigo,
        mensaje: error.message,
        detalles: error.detalles
      }
    });
    return;
  }

  // Errores no esperados: se registran para diagnostico y se responde con un
  // mensaje generico al cliente.
  const entorno = process.env.NODE_ENV;
  if (entorno !== 'test') {
    logError('Error no controlado en request', error, {
      requestId: idSolicitud(res),
      route: req.path,
      method: req.method
    });
  }

  const exponerMensaje = entorno !== 'production';
  const mensaje = exponerMensaje && error instanceof Error ? error.message : 'Error interno';
  responderErrorSimple(res, 500, 'ERROR_INTERNO', mensaje);
}
