/**
 * Crea la app HTTP (Express) del backend.
 *
 * Principios:
 * - Seguridad por defecto (cabeceras, sanitización, rate-limit)
 * - Validación en modulos (Zod) y error envelope consistente
 * - Dependencias inyectadas: las pruebas pasan repositorios en memoria
 */
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { configuracion } from './configuracion';
import { crearDependenciasMongo, type Dependencias } from './dependencias';
import { crearRouterApi } from './rutas';
import { manejadorErrores } from './compartido/errores/manejadorErrores';
import { middlewareIdSolicitud, middlewareRegistroSolicitud } from './compartido/observabilidad/middlewareObservabilidad';
import { sanitizarMongo } from './infraestructura/seguridad/sanitizarMongo';

export function crearApp(deps: Dependencias = crearDependenciasMongo()) {
  const app = express();

  // Reduce leakage de informacion sobre la tecnologia del servidor.
  app.disable('x-powered-by');

  app.use(helmet());
  app.use(
    cors({
      origin: configuracion.corsOrigenes,
      credentials: true,
      // Permite que el cliente lea el nombre real del informe o evidencia
      // (Content-Disposition) al descargar via fetch.
      exposedHeaders: ['Content-Disposition']
    })
  );
  app.use(express.json({ limit: configuracion.limiteJson }));
  app.use(sanitizarMongo());
  app.use(middlewareIdSolicitud);
  app.use(middlewareRegistroSolicitud);
  app.use(
    rateLimit({
      windowMs: configuracion.rateLimitWindowMs,
      limit: configuracion.rateLimitLimit,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.path.startsWith('/api/salud')
    })
  );

  app.use('/api', crearRouterApi(deps));

  app.use(manejadorErrores);

  return app;
}
