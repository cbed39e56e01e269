/**
 * Punto de entrada del backend.
 * Inicializa configuracion, base de datos y servidor HTTP.
 */
import { crearApp } from './app';
import { configuracion } from './configuracion';
import { crearDependenciasMongo } from './dependencias';
import { conectarBaseDatos } from './infraestructura/baseDatos/mongoose';
import { logError, log } from './infraestructura/logging/logger';
import { seedAdmin } from './modulos/modulo_autenticacion/seedAdmin';

async function iniciar() {
  await conectarBaseDatos();
  const deps = crearDependenciasMongo();
  await seedAdmin(deps.usuarios);

  const app = crearApp(deps);
  app.listen(configuracion.puerto, () => {
    log('ok', 'API escuchando', { puerto: configuracion.puerto, zonaHoraria: configuracion.zonaHoraria });
  });
}

iniciar().catch((error) => {
  logError('Error al iniciar el servidor', error);
  process.exit(1);
});
