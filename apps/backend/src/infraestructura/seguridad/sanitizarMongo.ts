/**
 * Quita de body y params las claves que Mongo interpretaria como operadores
 * (`$gt`, `$where`), rutas con punto y claves de prototipo.
 *
 * Express 5 vuelve a parsear `req.query` en cada acceso; la query se valida con
 * `validarConsulta` o se lee como texto.
 */
import type { NextFunction, Request, Response } from 'express';

const CLAVES_PROTOTIPO = ['__proto__', 'prototype', 'constructor'];

function claveInsegura(clave: string): boolean {
  return CLAVES_PROTOTIPO.includes(clave) || clave.startsWith('$') || clave.includes('.');
}

// Buffers, fechas y ObjectId no se recorren.
function esRegistroPlano(valor: unknown): valor is Record<string, unknown> {
  return typeof valor === 'object' && valor !== null && Object.prototype.toString.call(valor) === '[object Object]';
}

function limpiar(valor: unknown): void {
  if (Array.isArray(valor)) {
    valor.forEach(limpiar);
    return;
  }
  if (!esRegistroPlano(valor)) return;

  for (const clave of Object.keys(valor)) {
    if (claveInsegura(clave)) delete valor[clave];
    else limpiar(valor[clave]);
  }
}

export function sanitizarMongo() {
  return (req: Request, _res: Response, next: NextFunction) => {
    limpiar(req.body);
    limpiar(req.params);
    next();
  };
}
