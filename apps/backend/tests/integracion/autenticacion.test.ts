// Pruebas de ingreso, perfil y alta de usuarios.
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { crearHash } from '../../src/modulos/modulo_autenticacion/servicioHash';
import { verificarTokenUsuario } from '../../src/modulos/modulo_autenticacion/servicioTokens';
import { crearEscenario } from '../utils/escenario';
import type { DependenciasPrueba } from '../utils/repositoriosMemoria';
import { bearer, tokenAdminPrueba, tokenPrueba } from '../utils/token';

async function sembrarUsuario(deps: DependenciasPrueba, cambios: { roles?: string[]; activo?: boolean } = {}) {
  return deps.usuarios.crear({
    correo: 'analista@agente.test',
    nombre: 'Analista Prueba',
    hashContrasena: await crearHash('Clave-prueba-1'),
    roles: cambios.roles ?? ['analista'],
    empresas: [],
    activo: cambios.activo ?? true
  });
}

describe('autenticacion', () => {
  it('ingresa con credenciales validas y emite un token con roles', async () => {
    const { app, deps } = crearEscenario();
    const usuario = await sembrarUsuario(deps);

    const res = await request(app)
      .post('/api/autenticacion/ingresar')
      .send({ correo: 'ANALISTA@agente.test', contrasena: 'Clave-prueba-1' })
      .expect(200);

    expect(res.body.usuario).toEqual({
      id: usuario.id,
      nombre: 'Analista Prueba',
      correo: 'analista@agente.test',
      roles: ['analista']
    });
    expect(verificarTokenUsuario(res.body.token)).toEqual({ usuarioId: usuario.id, roles: ['analista'], empresas: [] });
    expect(deps.usuarios.registros.get(usuario.id)?.ultimoAcceso).toEqual(deps.reloj.now());
  });

  it('rechaza contrasena erronea y cuentas inactivas con el mismo codigo', async () => {
    const { app, deps } = crearEscenario();
    await sembrarUsuario(deps, { activo: false });

    const inactiva = await request(app)
      .post('/api/autenticacion/ingresar')
      .send({ correo: 'analista@agente.test', contrasena: 'Clave-prueba-1' })
      .expect(401);
    expect(inactiva.body.error.codigo).toBe('CREDENCIALES_INVALIDAS');

    const inexistente = await request(app)
      .post('/api/autenticacion/ingresar')
      .send({ correo: 'nadie@agente.test', contrasena: 'Clave-prueba-1' })
      .expect(401);
    expect(inexistente.body.error.codigo).toBe('CREDENCIALES_INVALIDAS');
  });

  it('valida el cuerpo del ingreso', async () => {
    const { app } = crearEscenario();
    const res = await request(app).post('/api/autenticacion/ingresar').send({ correo: 'no-es-correo' }).expect(400);
    expect(res.body.error.codigo).toBe('VALIDACION');
  });

  it('devuelve el perfil con permisos sin exponer el hash', async () => {
    const { app, deps } = crearEscenario();
    const usuario = await sembrarUsuario(deps, { roles: ['lector'] });

    const res = await request(app)
      .get('/api/autenticacion/perfil')
      .set(bearer(tokenPrueba(['lector'], [], usuario.id)))
      .expect(200);

    expect(res.body.usuario.hashContrasena).toBeUndefined();
    expect(res.body.usuario.permisos).toEqual(['empresas:leer', 'incidentes:leer', 'informes:leer', 'taxonomias:leer']);
  });

  it('rechaza tokens firmados con otro secreto', async () => {
    const { app } = crearEscenario();
    const res = await request(app).get('/api/autenticacion/perfil').set(bearer('token.falso.firma')).expect(401);
    expect(res.body.error.codigo).toBe('TOKEN_INVALIDO');
  });

  it('solo el admin crea usuarios y el correo es unico', async () => {
    const { app } = crearEscenario();
    const cuerpo = { correo: 'cliente@empresa.test', nombre: 'Cliente', contrasena: 'Clave-prueba-2' };

    await request(app).post('/api/autenticacion/usuarios').set(bearer(tokenPrueba(['analista']))).send(cuerpo).expect(403);

    const creado = await request(app).post('/api/autenticacion/usuarios').set(bearer(tokenAdminPrueba())).send(cuerpo).expect(201);
    expect(creado.body.usuario).toEqual(
      expect.objectContaining({ correo: 'cliente@empresa.test', roles: ['cliente'], empresas: [], activo: true })
    );
    expect(creado.body.usuario.hashContrasena).toBeUndefined();

    const duplicado = await request(app).post('/api/autenticacion/usuarios').set(bearer(tokenAdminPrueba())).send(cuerpo).expect(409);
    expect(duplicado.body.error.codigo).toBe('USUARIO_DUPLICADO');
  });
});
