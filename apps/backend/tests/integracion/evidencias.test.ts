// Pruebas de evidencias: subida multipart, numeracion, descarga y borrado logico.
import request from 'supertest';
import type { Express } from 'express';
import { describe, expect, it } from 'vitest';
import { crearEscenario, cuerpoIncidente, sembrarEmpresa } from '../utils/escenario';
import type { DependenciasPrueba } from '../utils/repositoriosMemoria';
import { bearer, tokenAdminPrueba, tokenPrueba } from '../utils/token';

const admin = () => bearer(tokenAdminPrueba());
const CONTENIDO = Buffer.from('log de prueba');

async function prepararIncidente(app: Express, deps: DependenciasPrueba) {
  const empresa = await sembrarEmpresa(deps);
  const res = await request(app).post('/api/incidentes').set(admin()).send(cuerpoIncidente(empresa.id)).expect(201);
  return { empresa, incidenteId: String(res.body.incidente.id) };
}

function subir(app: Express, incidenteId: string, campos: Record<string, string>, nombre = 'log.txt') {
  const solicitud = request(app).post(`/api/incidentes/${incidenteId}/evidencias`).set(admin()).attach('archivo', CONTENIDO, nombre);
  for (const [clave, valor] of Object.entries(campos)) solicitud.field(clave, valor);
  return solicitud;
}

describe('evidencias', () => {
  it('sube una evidencia de seccion con numero, hash y ruta en el almacen', async () => {
    const { app, deps } = crearEscenario();
    const { empresa, incidenteId } = await prepararIncidente(app, deps);

    const res = await subir(app, incidenteId, { seccion: 'identificacion', descripcion: 'Log del firewall' }).expect(201);
    const evidencia = res.body.evidencia;
    expect(evidencia).toEqual(
      expect.objectContaining({
        numero: '2.5.1',
        nombreOriginal: 'log.txt',
        tamanoBytes: CONTENIDO.length,
        descripcion: 'Log del firewall',
        estado: 'activo',
        subidoEn: '2025-06-15T14:30:00.000Z'
      })
    );
    expect(evidencia.hashSha256).toMatch(/^[0-9a-f]{64}$/);
    expect(evidencia.ruta).toBe(
      `empresa_${empresa.id}/incidente_1_12345678_INC_Ransomware_en_servidores/evidencias/${evidencia.archivoId}_log.txt`
    );
    expect(deps.almacen.archivos.get(evidencia.ruta)?.toString()).toBe('log de prueba');

    const incidente = await request(app).get(`/api/incidentes/${incidenteId}`).set(admin()).expect(200);
    expect(incidente.body.incidente.versionSemilla).toBe(2);
  });

  it('numera por seccion sin reutilizar numeros eliminados', async () => {
    const { app, deps } = crearEscenario();
    const { incidenteId } = await prepararIncidente(app, deps);

    const primera = await subir(app, incidenteId, { seccion: 'impacto' }).expect(201);
    expect(primera.body.evidencia.numero).toBe('3.4.1');
    const respuesta = await subir(app, incidenteId, { seccion: 'respuesta' }).expect(201);
    expect(respuesta.body.evidencia.numero).toBe('5.2.1');

    await request(app)
      .delete(`/api/incidentes/${incidenteId}/evidencias/${primera.body.evidencia.archivoId}`)
      .set(admin())
      .expect(204);
    const segunda = await subir(app, incidenteId, { seccion: 'impacto' }).expect(201);
    expect(segunda.body.evidencia.numero).toBe('3.4.2');

    const activas = await request(app).get(`/api/incidentes/${incidenteId}/evidencias`).set(admin()).expect(200);
    expect(activas.body.evidencias.map((e: { numero: string }) => e.numero)).toEqual(['3.4.2', '5.2.1']);

    const todas = await request(app).get(`/api/incidentes/${incidenteId}/evidencias?incluirEliminadas=true`).set(admin()).expect(200);
    expect(todas.body.total).toBe(3);
  });

  it('adjunta evidencias a una taxonomia del incidente', async () => {
    const { app, deps } = crearEscenario();
    const { incidenteId } = await prepararIncidente(app, deps);
    const tax = await request(app)
      .post(`/api/incidentes/${incidenteId}/taxonomias`)
      .set(admin())
      .send({ codigo: 'INC_DISP_INDS_RANS', justificacion: 'Nota de rescate' })
      .expect(201);

    const res = await subir(app, incidenteId, { taxonomiaId: tax.body.taxonomia.idUnico }, 'nota.pdf').expect(201);
    expect(res.body.evidencia.numero).toBe('4.4.1.1');

    const lista = await request(app).get(`/api/incidentes/${incidenteId}/evidencias`).set(admin()).expect(200);
    expect(lista.body.evidencias[0].ubicacion).toEqual({
      tipo: 'taxonomia',
      idUnico: tax.body.taxonomia.idUnico,
      codigo: 'INC_DISP_INDS_RANS'
    });

    const resumen = await request(app).get(`/api/incidentes/${incidenteId}/taxonomias`).set(admin()).expect(200);
    expect(resumen.body.totalEvidencias).toBe(1);
  });

  it('rechaza archivos invalidos', async () => {
    const { app, deps } = crearEscenario();
    const { incidenteId } = await prepararIncidente(app, deps);

    const extension = await subir(app, incidenteId, { seccion: 'identificacion' }, 'malware.exe').expect(400);
    expect(extension.body.error.codigo).toBe('EXTENSION_NO_PERMITIDA');

    const seccion = await subir(app, incidenteId, { seccion: 'lecciones' }).expect(400);
    expect(seccion.body.error.codigo).toBe('SECCION_SIN_EVIDENCIAS');

    const ambos = await subir(app, incidenteId, {
      seccion: 'identificacion',
      taxonomiaId: '2f1d3c4b-5a69-4e7f-8a9b-0c1d2e3f4a5b'
    }).expect(400);
    expect(ambos.body.error.codigo).toBe('VALIDACION');

    const sinArchivo = await request(app)
      .post(`/api/incidentes/${incidenteId}/evidencias`)
      .set(admin())
      .field('seccion', 'identificacion')
      .expect(400);
    expect(sinArchivo.body.error.codigo).toBe('ARCHIVO_REQUERIDO');

    const taxonomia = await subir(app, incidenteId, { taxonomiaId: '2f1d3c4b-5a69-4e7f-8a9b-0c1d2e3f4a5b' }).expect(404);
    expect(taxonomia.body.error.codigo).toBe('TAXONOMIA_NO_ENCONTRADA');
  });

  it('descarga el archivo original', async () => {
    const { app, deps } = crearEscenario();
    const { incidenteId } = await prepararIncidente(app, deps);
    const subida = await subir(app, incidenteId, { seccion: 'causaRaiz' }).expect(201);

    const res = await request(app)
      .get(`/api/incidentes/${incidenteId}/evidencias/${subida.body.evidencia.archivoId}/descarga`)
      .set(admin())
      .expect(200);
    expect(res.headers['content-disposition']).toBe('attachment; filename="log.txt"');
    expect(res.text).toBe('log de prueba');

    await request(app)
      .get(`/api/incidentes/${incidenteId}/evidencias/2f1d3c4b-5a69-4e7f-8a9b-0c1d2e3f4a5b/descarga`)
      .set(admin())
      .expect(404);
  });

  it('impide a un lector subir evidencias', async () => {
    const { app, deps } = crearEscenario();
    const { empresa, incidenteId } = await prepararIncidente(app, deps);
    await request(app)
      .post(`/api/incidentes/${incidenteId}/evidencias`)
      .set(bearer(tokenPrueba(['lector'], [empresa.id])))
      .attach('archivo', CONTENIDO, 'log.txt')
      .field('seccion', 'identificacion')
      .expect(403);
  });
});
