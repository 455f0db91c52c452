/**
 * Punto de entrada del gestor de perfiles.
 * Crea el contexto, siembra el administrador inicial y abre la vista de consola.
 * La conexion a MongoDB se cierra una sola vez al salir.
 */
import { createInterface } from 'node:readline';
import { ControladorPerfiles } from './controlador/controladorPerfiles';
import { crearContextoAplicacion, type ContextoAplicacion } from './contexto';
import { log, logError } from './infraestructura/logging/logger';
import { sembrarAdministrador } from './modulos/modulo_perfiles/sembrarAdministrador';
import { VistaConsola } from './vista/vistaConsola';

function registrarCierre(contexto: ContextoAplicacion): () => Promise<void> {
  let cierre: Promise<void> | null = null;
  return () => {
    if (!cierre) {
      log('system', 'Cerrando aplicacion');
      cierre = contexto.cerrar();
    }
    return cierre;
  };
}

async function iniciar() {
  const contexto = crearContextoAplicacion();
  const cerrar = registrarCierre(contexto);
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  // Ctrl+C, Ctrl+D (fin de stdin) o SIGTERM: cerrar el pool antes de salir.
  const terminar = (motivo: string) => {
    cerrar()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError(`Error al cerrar tras ${motivo}`, error);
        process.exit(1);
      });
  };
  rl.once('SIGINT', () => rl.close());
  rl.once('close', () => terminar('cerrar la consola'));
  process.once('SIGTERM', () => terminar('SIGTERM'));

  try {
    await sembrarAdministrador(contexto.configuracion, contexto.almacen, contexto.coleccion);
    const controlador = new ControladorPerfiles(contexto.almacen, contexto.sesion);
    await new VistaConsola(rl, controlador).ejecutar();
  } finally {
    rl.close();
    await cerrar();
  }
}

iniciar().catch((error) => {
  logError('Error al iniciar el gestor de perfiles', error);
  process.exit(1);
});
