/**
 * Almacen de perfiles: registro, inicio de sesion y CRUD de usuarios sobre la
 * coleccion `profiles`.
 *
 * Contrato de errores:
 * - Cada operacion convierte cualquier fallo de la base de datos en un unico
 *   `ErrorAplicacion` con su codigo (FALLO_REGISTRO, FALLO_CONSULTA, ...).
 * - La causa se registra en el log; no se expone al llamador.
 * - Un inicio de sesion con credenciales incorrectas devuelve `null`, no un error.
 */
import { ErrorAplicacion, type CodigoError } from '../../compartido/errores/errorAplicacion';
import { MENSAJES_ERROR } from '../../compartido/errores/mensajesError';
import { validarDatos } from '../../compartido/validaciones/validar';
import { camposDuplicados, esErrorClaveDuplicada } from '../../infraestructura/baseDatos/erroresMongo';
import { log, logError } from '../../infraestructura/logging/logger';
import type { CambiosUsuario, ColeccionPerfiles } from './coleccionPerfiles';
import { aPerfil, aUsuario, documentoDeUsuario, leerHashContrasena } from './mapeoPerfil';
import { compararContrasena, crearHash } from './servicioHash';
import type { SesionPerfil } from './sesionPerfil';
import type { Perfil, Usuario } from './tiposPerfil';
import {
  esquemaActualizacionUsuario,
  esquemaIdPerfil,
  esquemaRegistroUsuario,
  contrasenaCabeEnHash,
  type ActualizacionUsuario,
  type RegistroUsuario
} from './validacionesPerfiles';

export type CampoCredencial = 'email' | 'username';

export function errorCredencialDuplicada(campos: CampoCredencial[]): ErrorAplicacion {
  const ambos = campos.includes('email') && campos.includes('username');
  let mensaje = 'El nombre de usuario ya existe';
  if (ambos) mensaje = 'El correo y el nombre de usuario ya existen';
  else if (campos.includes('email')) mensaje = 'El correo ya existe';
  return new ErrorAplicacion('CREDENCIAL_DUPLICADA', mensaje, { campos });
}

export class AlmacenPerfiles {
  constructor(
    private readonly coleccion: ColeccionPerfiles,
    private readonly sesion: SesionPerfil
  ) {}

  private async ejecutar<T>(codigo: CodigoError, operacion: () => Promise<T>, meta: Record<string, unknown> = {}): Promise<T> {
    try {
      return await operacion();
    } catch (error) {
      logError(MENSAJES_ERROR[codigo], error, { codigo, ...meta });
      throw new ErrorAplicacion(codigo, MENSAJES_ERROR[codigo]);
    }
  }

  /**
   * Indica que credenciales ya existen. Las dos consultas son independientes.
   */
  async verificarCredenciales(email: string, username: string): Promise<CampoCredencial[]> {
    return this.ejecutar('FALLO_VERIFICACION', async () => {
      const [existeCorreo, existeNombreUsuario] = await Promise.all([
        this.coleccion.existeCorreo(email),
        this.coleccion.existeNombreUsuario(username)
      ]);
      const campos: CampoCredencial[] = [];
      if (existeCorreo) campos.push('email');
      if (existeNombreUsuario) campos.push('username');
      return campos;
    });
  }

  async registrar(entrada: RegistroUsuario): Promise<Usuario> {
    const { contrasena, ...datos } = validarDatos(esquemaRegistroUsuario, entrada);

    const existentes = await this.verificarCredenciales(datos.correo, datos.nombreUsuario);
    if (existentes.length > 0) {
      throw errorCredencialDuplicada(existentes);
    }

    let id: string;
    try {
      const hash = await crearHash(contrasena);
      id = await this.coleccion.insertar(documentoDeUsuario(datos, hash));
    } catch (error) {
      // Otro registro pudo colarse entre la verificacion y la insercion; el
      // indice unico lo detecta.
      if (esErrorClaveDuplicada(error)) {
        const campos = camposDuplicados(error).filter(
          (campo): campo is CampoCredencial => campo === 'email' || campo === 'username'
        );
        throw errorCredencialDuplicada(campos.length > 0 ? campos : ['email', 'username']);
      }
      logError(MENSAJES_ERROR.FALLO_REGISTRO, error, { codigo: 'FALLO_REGISTRO' });
      throw new ErrorAplicacion('FALLO_REGISTRO', MENSAJES_ERROR.FALLO_REGISTRO);
    }

    log('info', 'Usuario registrado', { perfilId: id });
    return { tipo: 'User', id, ...datos };
  }

  /**
   * Busca por correo o nombre de usuario y compara la contrasena.
   * Devuelve `null` si no hay coincidencia; en caso de exito actualiza la sesion.
   */
  async iniciarSesion(credencial: string, contrasena: string): Promise<Perfil | null> {
    const credencialLimpia = String(credencial ?? '').trim();
    if (!credencialLimpia || !contrasena || !contrasenaCabeEnHash(contrasena)) return null;

    const documento = await this.ejecutar('FALLO_INICIO_SESION', () =>
      this.coleccion.buscarPorCredencial(credencialLimpia)
    );
    if (!documento) return null;

    const hash = leerHashContrasena(documento);
    const coincide = await this.ejecutar('FALLO_INICIO_SESION', () => compararContrasena(contrasena, hash));
    if (!coincide) return null;

    const perfil = aPerfil(documento);
    this.sesion.establecerPerfil(perfil);
    log('info', 'Inicio de sesion', { perfilId: perfil.id, tipo: perfil.tipo });
    return perfil;
  }

  /**
   * Todos los documentos de tipo "User", en el orden natural de la coleccion.
   */
  async obtenerUsuarios(): Promise<Usuario[]> {
    const documentos = await this.ejecutar('FALLO_CONSULTA', () => this.coleccion.listarUsuarios());
    return documentos.map(aUsuario);
  }

  /**
   * Actualiza contrasena, nombre, apellido, telefono, genero y tarjeta.
   * `false` si el id no existe o ningun campo cambia.
   */
  async actualizarUsuario(entrada: ActualizacionUsuario): Promise<boolean> {
    const datos = validarDatos(esquemaActualizacionUsuario, entrada);
    if (!esquemaIdPerfil.safeParse(datos.id).success) return false;

    const actual = await this.ejecutar('FALLO_ACTUALIZACION', () => this.coleccion.buscarUsuarioPorId(datos.id), {
      perfilId: datos.id
    });
    if (!actual) return false;

    const usuario = aUsuario(actual);
    const cambios: CambiosUsuario = {};
    if (datos.nombre !== usuario.nombre) cambios.name = datos.nombre;
    if (datos.apellido !== usuario.apellido) cambios.lastname = datos.apellido;
    if (datos.telefono !== usuario.telefono) cambios.telephone = datos.telefono;
    if (datos.genero !== usuario.genero) cambios.gender = datos.genero;
    if (datos.tarjeta !== usuario.tarjeta) cambios.card = datos.tarjeta;

    const nuevaContrasena = datos.contrasena;
    if (nuevaContrasena !== undefined) {
      await this.ejecutar('FALLO_ACTUALIZACION', async () => {
        if (!(await compararContrasena(nuevaContrasena, leerHashContrasena(actual)))) {
          cambios.password = await crearHash(nuevaContrasena);
        }
      });
    }

    if (Object.keys(cambios).length === 0) return false;

    const actualizado = await this.ejecutar(
      'FALLO_ACTUALIZACION',
      () => this.coleccion.actualizarUsuario(datos.id, cambios),
      { perfilId: datos.id }
    );
    if (actualizado) {
      log('info', 'Usuario actualizado', { perfilId: datos.id, campos: Object.keys(cambios) });
    }
    return actualizado;
  }

  async eliminarUsuario(id: string): Promise<boolean> {
    if (!esquemaIdPerfil.safeParse(id).success) return false;

    const eliminado = await this.ejecutar('FALLO_ELIMINACION', () => this.coleccion.eliminar(id), { perfilId: id });
    if (eliminado) {
      log('info', 'Perfil eliminado', { perfilId: id });
    }
    return eliminado;
  }
}
