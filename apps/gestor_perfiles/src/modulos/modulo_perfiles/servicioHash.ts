/**
 * Hash de contrasenas con bcrypt (salt incluido en el propio hash).
 */
import bcrypt from 'bcrypt';
import { configuracion } from '../../configuracion';

export function crearHash(contrasena: string, rondas = configuracion.bcryptRondas): Promise<string> {
  return bcrypt.hash(contrasena, rondas);
}

export function compararContrasena(contrasena: string, hash: string): Promise<boolean> {
  return bcrypt.compare(contrasena, hash);
}
