/**
 * Rutas de autenticacion.
 */
import { Router, type RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import { configuracion } from '../../configuracion';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import type { Dependencias } from '../../dependencias';
import { crearControladorAutenticacion } from './controladorAutenticacion';
import { requerirUsuario } from './middlewareAutenticacion';
import { requerirPermiso } from './middlewarePermisos';
import { esquemaCrearUsuario, esquemaIngresar } from './validacionesAutenticacion';

const esProduccion = configuracion.entorno === 'production';

const sinRateLimit: RequestHandler = (_req, _res, next) => next();

const limiterCredenciales: RequestHandler = esProduccion
  ? rateLimit({
      windowMs: configuracion.rateLimitWindowMs,
      limit: configuracion.rateLimitCredencialesLimit,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (_req, res) => {
        res.status(429).json({
          error: {
            codigo: 'RATE_LIMIT',
            mensaje: 'Demasiados intentos, intenta mas tarde'
          }
        });
      }
    })
  : sinRateLimit;

export function crearRutasAutenticacion(deps: Dependencias) {
  const router = Router();
  const controlador = crearControladorAutenticacion(deps);

  router.post('/ingresar', limiterCredenciales, validarCuerpo(esquemaIngresar), controlador.ingresar);
  router.get('/perfil', requerirUsuario, controlador.perfil);
  router.post(
    '/usuarios',
    requerirUsuario,
    requerirPermiso('usuarios:administrar'),
    validarCuerpo(esquemaCrearUsuario),
    controlador.crearUsuario
  );

  return router;
}
