// Setup comun para pruebas del backend.
import os from 'node:os';
import path from 'node:path';

process.env.NODE_ENV = 'test';

// En pruebas de integracion se realizan muchas requests en poco tiempo.
// Subimos el limite para evitar falsos negativos por rate limiting.
process.env.RATE_LIMIT_LIMIT = '10000';

// Hash barato para que las altas de usuario no dominen el tiempo de prueba.
process.env.BCRYPT_RONDAS = '4';

process.env.JWT_SECRETO = 'test-secret';

// El readiness prueba escritura en el almacen; se apunta fuera del repo.
process.env.ARCHIVOS_DIR = path.join(os.tmpdir(), 'agente-digital-pruebas');

// Sin plantillas: los informes .docx se arman desde el informe estructurado.
process.env.PLANTILLAS_DIR = path.join(os.tmpdir(), 'agente-digital-sin-plantillas');
