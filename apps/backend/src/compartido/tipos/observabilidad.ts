export type RespuestaSalud = {
  estado: 'ok' | 'degradado';
  tiempoActivo: number;
};

export type RespuestaLiveness = RespuestaSalud & {
  servicio: string;
  env: string;
};

export type RespuestaReadiness = RespuestaSalud & {
  dependencias: {
    db: {
      estado: number;
      descripcion: string;
      lista: boolean;
    };
    almacen: {
      ruta: string;
      lista: boolean;
    };
  };
};
