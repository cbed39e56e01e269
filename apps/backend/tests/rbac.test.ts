// Pruebas del catalogo de roles y permisos.
import { describe, expect, it } from 'vitest';
import {
  normalizarRoles,
  permisosComoLista,
  tieneAlcanceGlobal,
  tienePermiso
} from '../src/infraestructura/seguridad/rbac';

describe('rbac', () => {
  it('descarta roles desconocidos', () => {
    expect(normalizarRoles([' admin ', 'superusuario', 'lector'])).toEqual(['admin', 'lector']);
    expect(normalizarRoles('admin')).toEqual([]);
  });

  it('el cliente genera informes pero no registra envios ni administra usuarios', () => {
    expect(tienePermiso(['cliente'], 'informes:generar')).toBe(true);
    expect(tienePermiso(['cliente'], 'informes:registrar_envio')).toBe(false);
    expect(tienePermiso(['cliente'], 'usuarios:administrar')).toBe(false);
  });

  it('solo el admin elimina incidentes', () => {
    expect(tienePermiso(['admin'], 'incidentes:eliminar')).toBe(true);
    expect(tienePermiso(['analista'], 'incidentes:eliminar')).toBe(false);
  });

  it('combina los permisos de varios roles', () => {
    expect(permisosComoLista(['lector', 'cliente'])).toEqual([
      'empresas:leer',
      'evidencias:gestionar',
      'incidentes:gestionar',
      'incidentes:leer',
      'informes:generar',
      'informes:leer',
      'taxonomias:leer'
    ]);
  });

  it('solo admin y analista tienen alcance global', () => {
    expect(tieneAlcanceGlobal(['analista'])).toBe(true);
    expect(tieneAlcanceGlobal(['cliente', 'lector'])).toBe(false);
  });
});
