/**
 * Perfil autenticado de la aplicacion.
 *
 * Hay una instancia por contexto de aplicacion. Solo el inicio de sesion
 * exitoso la reemplaza; un intento fallido conserva el perfil anterior.
 */
import type { Perfil } from './tiposPerfil';

export class SesionPerfil {
  private perfil: Perfil | null = null;

  get perfilActual(): Perfil | null {
    return this.perfil;
  }

  establecerPerfil(perfil: Perfil): void {
    this.perfil = perfil;
  }

  cerrarSesion(): void {
    this.perfil = null;
  }
}
