/**
 * Error estandar para respuestas controladas del API.
 *
 * Se usa para construir el "envelope" de error consistente:
 * `{ error: { codigo, mensaje, detalles? } }`.
 *
 * Notas:
 * - `codigo` debe ser estable (orientado a maquina) para que el frontend pueda
 *   mapearlo a mensajes amigables (p. ej. `CAMPOS_ANCI_FALTANTES`).
 * - `detalles` se usa para errores de validacion (`zod.flatten()`) y para la
 *   lista de campos ANCI faltantes.
 */
export class ErrorAplicacion extends Error {
  codigo: string;
  estadoHttp: number;
  detalles?: unknown;

  constructor(codigo: string, mensaje: string, estadoHttp = 400, detalles?: unknown) {
    super(mensaje);
    this.name = 'ErrorAplicacion';
    this.codigo = codigo;
    this.estadoHttp = estadoHttp;
    this.detalles = detalles;
  }
}
