/**
 * Metricas en formato de texto Prometheus.
 *
 * Contadores en memoria del proceso; se reinician con cada arranque.
 */
const inicioDelProceso = Date.now();
const prefijo = 'agente_digital';

type ClaveSolicitud = `${string}|${string}|${number}`;

const solicitudesPorRuta = new Map<ClaveSolicitud, number>();
const solicitudesTotales = { total: 0, errores: 0 };
const informesPorTipo = new Map<string, number>();
const evidenciasTotales = { subidas: 0, rechazadas: 0 };

const cubetasMs = [25, 50, 100, 250, 500, 1000, 2500, 5000];
const histogramaDuracion = new Map<number, number>();

for (const cubeta of cubetasMs) histogramaDuracion.set(cubeta, 0);
histogramaDuracion.set(Infinity, 0);

function incrementarCubeta(duracionMs: number) {
  for (const cubeta of cubetasMs) {
    if (duracionMs <= cubeta) {
      histogramaDuracion.set(cubeta, (histogramaDuracion.get(cubeta) ?? 0) + 1);
      return;
    }
  }
  histogramaDuracion.set(Infinity, (histogramaDuracion.get(Infinity) ?? 0) + 1);
}

export function registrarRequestHttp(method: string, route: string, status: number, durationMs: number) {
  const metodo = String(method || 'GET').toUpperCase();
  const ruta = String(route || '/');
  const estatus = Number.isFinite(status) ? status : 500;
  const clave: ClaveSolicitud = `${metodo}|${ruta}|${estatus}`;
  solicitudesPorRuta.set(clave, (solicitudesPorRuta.get(clave) ?? 0) + 1);

  solicitudesTotales.total += 1;
  if (estatus >= 500) solicitudesTotales.errores += 1;
  incrementarCubeta(Math.max(0, Math.round(durationMs)));
}

export function registrarInformeGenerado(tipoInforme: string, formato: 'docx' | 'json') {
  const clave = `${tipoInforme}|${formato}`;
  informesPorTipo.set(clave, (informesPorTipo.get(clave) ?? 0) + 1);
}

export function registrarEvidencia(aceptada: boolean) {
  if (aceptada) evidenciasTotales.subidas += 1;
  else evidenciasTotales.rechazadas += 1;
}

export function exportarMetricasPrometheus(): string {
  const lineas: string[] = [];
  lineas.push(`# HELP ${prefijo}_http_requests_total Total de requests HTTP procesados`);
  lineas.push(`# TYPE ${prefijo}_http_requests_total counter`);
  for (const [clave, valor] of solicitudesPorRuta.entries()) {
    const [metodo, ruta, estatus] = clave.split('|');
    lineas.push(`${prefijo}_http_requests_total{method="${metodo}",route="${ruta}",status="${estatus}"} ${valor}`);
  }
  lineas.push('');

  lineas.push(`# HELP ${prefijo}_http_request_duration_ms_bucket Histograma simple de latencia por buckets`);
  lineas.push(`# TYPE ${prefijo}_http_request_duration_ms_bucket counter`);
  for (const [cubeta, valor] of histogramaDuracion.entries()) {
    const le = cubeta === Infinity ? '+Inf' : String(cubeta);
    lineas.push(`${prefijo}_http_request_duration_ms_bucket{le="${le}"} ${valor}`);
  }
  lineas.push('');

  lineas.push(`# HELP ${prefijo}_process_uptime_seconds Uptime del proceso`);
  lineas.push(`# TYPE ${prefijo}_process_uptime_seconds gauge`);
  lineas.push(`${prefijo}_process_uptime_seconds ${Math.floor((Date.now() - inicioDelProceso) / 1000)}`);
  lineas.push('');

  lineas.push(`# HELP ${prefijo}_http_errors_total Total de respuestas con error 5xx`);
  lineas.push(`# TYPE ${prefijo}_http_errors_total counter`);
  lineas.push(`${prefijo}_http_errors_total ${solicitudesTotales.errores}`);
  lineas.push('');

  lineas.push(`# HELP ${prefijo}_informes_generados_total Informes ANCI generados por tipo y formato`);
  lineas.push(`# TYPE ${prefijo}_informes_generados_total counter`);
  for (const [clave, valor] of informesPorTipo.entries()) {
    const [tipo, formato] = clave.split('|');
    lineas.push(`${prefijo}_informes_generados_total{tipo="${tipo}",formato="${formato}"} ${valor}`);
  }
  lineas.push('');

  lineas.push(`# HELP ${prefijo}_evidencias_total Evidencias recibidas por resultado`);
  lineas.push(`# TYPE ${prefijo}_evidencias_total counter`);
  lineas.push(`${prefijo}_evidencias_total{resultado="aceptada"} ${evidenciasTotales.subidas}`);
  lineas.push(`${prefijo}_evidencias_total{resultado="rechazada"} ${evidenciasTotales.rechazadas}`);

  return lineas.join('\n');
}
