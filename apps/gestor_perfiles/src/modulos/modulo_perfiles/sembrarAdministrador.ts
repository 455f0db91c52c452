import type { Configuracion, SemillaAdministrador } from '../../configuracion';
import { validarDatos } from '../../compartido/validaciones/validar';
import { log } from '../../infraestructura/logging/logger';
import type { AlmacenPerfiles } from './almacenPerfiles';
import type { ColeccionPerfiles } from './coleccionPerfiles';
import { documentoDeAdministrador } from './mapeoPerfil';
import { crearHash } from './servicioHash';
import { esquemaAdministrador } from './validacionesPerfiles';

export type ResultadoSemilla = 'creado' | 'existente' | 'omitido';

function debeSembrar(entorno: string, semilla: SemillaAdministrador): boolean {
  if (entorno !== 'production') return true;
  return semilla.forzar;
}

/**
 * Crea el administrador inicial si la configuracion lo define y todavia no
 * existe ningun perfil con ese correo o nombre de usuario.
 */
export async function sembrarAdministrador(
  config: Pick<Configuracion, 'entorno' | 'semillaAdmin'>,
  almacen: AlmacenPerfiles,
  coleccion: ColeccionPerfiles
): Promise<ResultadoSemilla> {
  const semilla = config.semillaAdmin;
  if (!semilla || !debeSembrar(config.entorno, semilla)) return 'omitido';

  const { contrasena, ...datos } = validarDatos(esquemaAdministrador, {
    correo: semilla.correo,
    nombreUsuario: semilla.nombreUsuario,
    contrasena: semilla.contrasena,
    nombre: semilla.nombre,
    apellido: semilla.apellido,
    cuentaActual: semilla.cuentaActual
  });

  const existentes = await almacen.verificarCredenciales(datos.correo, datos.nombreUsuario);
  if (existentes.length > 0) {
    log('info', 'Administrador inicial ya existe', { campos: existentes });
    return 'existente';
  }

  const hash = await crearHash(contrasena);
  const id = await coleccion.insertar(documentoDeAdministrador(datos, hash));
  log('ok', 'Administrador inicial creado', { perfilId: id });
  return 'creado';
}
