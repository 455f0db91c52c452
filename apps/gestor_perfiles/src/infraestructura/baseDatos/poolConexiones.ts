/**
 * Pool de conexiones a MongoDB con Mongoose.
 *
 * Decisiones:
 * - La conexion se abre en el primer acceso y todos los accesos concurrentes
 *   esperan la misma inicializacion.
 * - Se usa `createConnection` (no la conexion global) para que cada contexto
 *   de aplicacion sea duenio de su propio pool.
 * - `cerrar()` se invoca una vez al terminar la aplicacion; llamarlo de nuevo
 *   no hace nada.
 */
import mongoose, { type ConnectOptions, type Connection } from 'mongoose';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { MENSAJES_ERROR } from '../../compartido/errores/mensajesError';
import { log, logError } from '../logging/logger';

export interface OpcionesPool {
  mongoUri: string;
  baseDatos: string;
  poolMaximo: number;
  poolMinimo: number;
  esperaMaximaMs: number;
}

export type FabricaConexion = (uri: string, opciones: ConnectOptions) => Promise<Connection>;

export const fabricaMongoose: FabricaConexion = (uri, opciones) => {
  mongoose.set('strictQuery', true);
  return mongoose.createConnection(uri, opciones).asPromise();
};

export function construirOpcionesConexion(opciones: OpcionesPool): ConnectOptions {
  return {
    dbName: opciones.baseDatos,
    maxPoolSize: opciones.poolMaximo,
    minPoolSize: opciones.poolMinimo,
    waitQueueTimeoutMS: opciones.esperaMaximaMs
  };
}

// Evita que credenciales de la URI terminen en el log.
export function ocultarCredenciales(uri: string): string {
  return uri.replace(/\/\/[^@/]+@/, '//***@');
}

export class PoolConexiones {
  private inicializacion: Promise<Connection> | null = null;
  private cerrado = false;

  constructor(
    private readonly opciones: OpcionesPool,
    private readonly fabrica: FabricaConexion = fabricaMongoose
  ) {}

  get estaCerrado(): boolean {
    return this.cerrado;
  }

  obtenerBaseDatos(): Promise<Connection> {
    if (this.cerrado) {
      return Promise.reject(new ErrorAplicacion('POOL_CERRADO', MENSAJES_ERROR.POOL_CERRADO));
    }
    if (!this.inicializacion) {
      this.inicializacion = this.inicializar();
    }
    return this.inicializacion;
  }

  private async inicializar(): Promise<Connection> {
    const destino = {
      uri: ocultarCredenciales(this.opciones.mongoUri),
      baseDatos: this.opciones.baseDatos
    };
    try {
      const conexion = await this.fabrica(this.opciones.mongoUri, construirOpcionesConexion(this.opciones));
      log('ok', 'Conexion a MongoDB exitosa', {
        ...destino,
        poolMaximo: this.opciones.poolMaximo,
        poolMinimo: this.opciones.poolMinimo
      });
      return conexion;
    } catch (error) {
      // El siguiente acceso vuelve a intentarlo.
      this.inicializacion = null;
      logError('Fallo la conexion a MongoDB', error, destino);
      throw error;
    }
  }

  async cerrar(): Promise<void> {
    if (this.cerrado) return;
    this.cerrado = true;

    const pendiente = this.inicializacion;
    this.inicializacion = null;
    if (!pendiente) return;

    let conexion: Connection;
    try {
      conexion = await pendiente;
    } catch (error) {
      log('warn', 'No habia conexion abierta que cerrar', {
        motivo: error instanceof Error ? error.message : String(error)
      });
      return;
    }
    await conexion.close();
    log('system', 'Conexion a MongoDB cerrada', { baseDatos: this.opciones.baseDatos });
  }
}
