/**
 * Controlador entre la vista de consola y el almacen de perfiles.
 *
 * Contrato:
 * - Nunca lanza: devuelve `{ ok: true, valor }` o `{ ok: false, mensaje }`.
 * - `ErrorAplicacion` se muestra con su mensaje; los errores no esperados se
 *   registran y se muestran con un mensaje generico.
 * - Listar, editar y eliminar otros usuarios requiere sesion de administrador.
 */
import { ErrorAplicacion } from '../compartido/errores/errorAplicacion';
import { MENSAJE_ERROR_INESPERADO } from '../compartido/errores/mensajesError';
import { logError } from '../infraestructura/logging/logger';
import type { AlmacenPerfiles } from '../modulos/modulo_perfiles/almacenPerfiles';
import type { SesionPerfil } from '../modulos/modulo_perfiles/sesionPerfil';
import { esAdministrador, type Perfil, type Usuario } from '../modulos/modulo_perfiles/tiposPerfil';
import type { ActualizacionUsuario, RegistroUsuario } from '../modulos/modulo_perfiles/validacionesPerfiles';

export type Fallo = { ok: false; mensaje: string };
export type Resultado<T> = { ok: true; valor: T } | Fallo;

export const MENSAJE_CREDENCIALES_INVALIDAS = 'Credenciales incorrectas.';
export const MENSAJE_SIN_PERMISO = 'Solo un administrador puede realizar esta accion.';
export const MENSAJE_SIN_CAMBIOS = 'No hubo cambios que guardar.';
export const MENSAJE_NO_ENCONTRADO = 'No existe un usuario con ese id.';

function fallo(mensaje: string): Fallo {
  return { ok: false, mensaje };
}

export class ControladorPerfiles {
  constructor(
    private readonly almacen: AlmacenPerfiles,
    private readonly sesion: SesionPerfil
  ) {}

  private async intentar<T>(accion: string, operacion: () => Promise<T>): Promise<Resultado<T>> {
    try {
      return { ok: true, valor: await operacion() };
    } catch (error) {
      if (error instanceof ErrorAplicacion) return fallo(error.message);
      logError(`Error no controlado al ${accion}`, error);
      return fallo(MENSAJE_ERROR_INESPERADO);
    }
  }

  /** Solo el propio usuario o un administrador puede tocar una cuenta. */
  private puedeGestionar(id: string): boolean {
    const actual = this.sesion.perfilActual;
    if (!actual) return false;
    return esAdministrador(actual) || actual.id === id;
  }

  get perfilActual(): Perfil | null {
    return this.sesion.perfilActual;
  }

  registrar(datos: RegistroUsuario): Promise<Resultado<Usuario>> {
    return this.intentar('registrar', () => this.almacen.registrar(datos));
  }

  async iniciarSesion(credencial: string, contrasena: string): Promise<Resultado<Perfil>> {
    const resultado = await this.intentar('iniciar sesion', () => this.almacen.iniciarSesion(credencial, contrasena));
    if (!resultado.ok) return resultado;
    if (!resultado.valor) return fallo(MENSAJE_CREDENCIALES_INVALIDAS);
    return { ok: true, valor: resultado.valor };
  }

  cerrarSesion(): void {
    this.sesion.cerrarSesion();
  }

  async listarUsuarios(): Promise<Resultado<Usuario[]>> {
    if (!esAdministrador(this.sesion.perfilActual)) return fallo(MENSAJE_SIN_PERMISO);
    return this.intentar('listar usuarios', () => this.almacen.obtenerUsuarios());
  }

  async actualizarUsuario(datos: ActualizacionUsuario): Promise<Resultado<true>> {
    if (!this.puedeGestionar(datos.id)) return fallo(MENSAJE_SIN_PERMISO);
    const resultado = await this.intentar('actualizar usuario', () => this.almacen.actualizarUsuario(datos));
    if (!resultado.ok) return resultado;
    if (!resultado.valor) return fallo(MENSAJE_SIN_CAMBIOS);
    return { ok: true, valor: true };
  }

  async eliminarUsuario(id: string): Promise<Resultado<true>> {
    if (!this.puedeGestionar(id)) return fallo(MENSAJE_SIN_PERMISO);
    const resultado = await this.intentar('eliminar usuario', () => this.almacen.eliminarUsuario(id));
    if (!resultado.ok) return resultado;
    if (!resultado.valor) return fallo(MENSAJE_NO_ENCONTRADO);

    // Un usuario que borra su propia cuenta queda fuera de la sesion.
    if (this.sesion.perfilActual?.id === id) this.sesion.cerrarSesion();
    return { ok: true, valor: true };
  }
}
