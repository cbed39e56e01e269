/**
 * Catalogo central de roles y permisos (RBAC).
 *
 * Nota: Los permisos se usan tanto para enforcement (middleware)
 * como para devolver el perfil de accesos al cliente.
 */
export const PERMISOS = [
  'empresas:leer',
  'empresas:gestionar',
  'incidentes:leer',
  'incidentes:gestionar',
  'incidentes:eliminar',
  'evidencias:gestionar',
  'taxonomias:leer',
  'informes:leer',
  'informes:generar',
  'informes:registrar_envio',
  'usuarios:administrar'
] as const;

export type Permiso = (typeof PERMISOS)[number];

export const ROLES = ['admin', 'analista', 'cliente', 'lector'] as const;
export type Rol = (typeof ROLES)[number];

/** Roles que ven todas las empresas; el resto queda acotado a las de su token. */
export const ROLES_GLOBALES: readonly Rol[] = ['admin', 'analista'];

const PERMISOS_ANALISTA: Permiso[] = [
  'empresas:leer',
  'incidentes:leer',
  'incidentes:gestionar',
  'evidencias:gestionar',
  'taxonomias:leer',
  'informes:leer',
  'informes:generar',
  'informes:registrar_envio'
];

const PERMISOS_CLIENTE: Permiso[] = [
  'empresas:leer',
  'incidentes:leer',
  'incidentes:gestionar',
  'evidencias:gestionar',
  'taxonomias:leer',
  'informes:leer',
  'informes:generar'
];

const PERMISOS_LECTOR: Permiso[] = ['empresas:leer', 'incidentes:leer', 'taxonomias:leer', 'informes:leer'];

export const PERMISOS_POR_ROL: Record<Rol, Permiso[]> = {
  admin: [...PERMISOS],
  analista: PERMISOS_ANALISTA,
  cliente: PERMISOS_CLIENTE,
  lector: PERMISOS_LECTOR
};

export function normalizarRoles(roles: unknown): Rol[] {
  const lista = Array.isArray(roles) ? roles.map((rol) => String(rol).trim()) : [];
  return lista.filter((rol): rol is Rol => ROLES.some((r) => r === rol));
}

export function permisosParaRoles(roles: unknown): Set<Permiso> {
  const permisos = new Set<Permiso>();
  normalizarRoles(roles).forEach((rol) => {
    PERMISOS_POR_ROL[rol].forEach((permiso) => permisos.add(permiso));
  });
  return permisos;
}

export function permisosComoLista(roles: unknown): Permiso[] {
  return Array.from(permisosParaRoles(roles)).sort();
}

export function tienePermiso(roles: unknown, permiso: Permiso): boolean {
  return permisosParaRoles(roles).has(permiso);
}

export function tieneAlcanceGlobal(roles: unknown): boolean {
  return normalizarRoles(roles).some((rol) => ROLES_GLOBALES.includes(rol));
}
