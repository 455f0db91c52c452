/**
 * Contexto de aplicacion: pool, sesion y almacen se construyen aqui una vez
 * y se pasan a quien los necesite (sin singletons globales).
 */
import { configuracion as configuracionPorDefecto, type Configuracion } from './configuracion';
import { PoolConexiones, type FabricaConexion } from './infraestructura/baseDatos/poolConexiones';
import { AlmacenPerfiles } from './modulos/modulo_perfiles/almacenPerfiles';
import { ColeccionPerfilesMongo, type ColeccionPerfiles } from './modulos/modulo_perfiles/coleccionPerfiles';
import { SesionPerfil } from './modulos/modulo_perfiles/sesionPerfil';

export interface ContextoAplicacion {
  configuracion: Configuracion;
  pool: PoolConexiones;
  sesion: SesionPerfil;
  coleccion: ColeccionPerfiles;
  almacen: AlmacenPerfiles;
  cerrar(): Promise<void>;
}

export function crearContextoAplicacion(
  configuracion: Configuracion = configuracionPorDefecto,
  fabricaConexion?: FabricaConexion
): ContextoAplicacion {
  const pool = new PoolConexiones(configuracion, fabricaConexion);
  const sesion = new SesionPerfil();
  const coleccion = new ColeccionPerfilesMongo(pool);
  const almacen = new AlmacenPerfiles(coleccion, sesion);

  return {
    configuracion,
    pool,
    sesion,
    coleccion,
    almacen,
    cerrar: () => pool.cerrar()
  };
}
