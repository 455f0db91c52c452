/**
 * Validaciones de entrada para registro, inicio de sesion y actualizacion.
 */
import { z } from 'zod';
import { normalizarEspacios } from '../../compartido/utilidades/texto';
import { GENEROS } from './tiposPerfil';

// ObjectId en hexadecimal; cualquier otro valor se trata como "no existe".
export const esquemaIdPerfil = z.string().regex(/^[a-f0-9]{24}$/i);

// bcrypt solo lee los primeros 72 bytes; una contrasena mas larga no se puede verificar completa.
export const MAXIMO_BYTES_CONTRASENA = 72;

export function contrasenaCabeEnHash(contrasena: string): boolean {
  return Buffer.byteLength(contrasena, 'utf8') <= MAXIMO_BYTES_CONTRASENA;
}

const textoContrasena = z
  .string()
  .refine(contrasenaCabeEnHash, { message: `La contrasena no puede superar ${MAXIMO_BYTES_CONTRASENA} bytes` });

const textoNombre = z.string().transform(normalizarEspacios).pipe(z.string().min(1).max(80));
const textoOpcional = z.string().trim().max(40).default('');

export const esquemaRegistroUsuario = z
  .object({
    correo: z.string().trim().toLowerCase().pipe(z.string().email()),
    nombreUsuario: z.string().trim().min(1).max(40),
    contrasena: z.string().min(1).pipe(textoContrasena),
    nombre: textoNombre,
    apellido: textoNombre,
    telefono: textoOpcional,
    genero: z.enum(GENEROS),
    tarjeta: textoOpcional
  })
  .strict();

export const esquemaActualizacionUsuario = z
  .object({
    id: z.string().trim(),
    // Sin contrasena (o vacia) se conserva el hash guardado.
    contrasena: textoContrasena
      .optional()
      .transform((valor) => (valor ? valor : undefined)),
    nombre: textoNombre,
    apellido: textoNombre,
    telefono: textoOpcional,
    genero: z.enum(GENEROS),
    tarjeta: textoOpcional
  })
  .strict();

export const esquemaAdministrador = z
  .object({
    correo: z.string().trim().toLowerCase().pipe(z.string().email()),
    nombreUsuario: z.string().trim().min(1).max(40),
    contrasena: z.string().min(1).pipe(textoContrasena),
    nombre: textoNombre,
    apellido: textoNombre,
    telefono: textoOpcional,
    cuentaActual: z.string().trim().max(60).default('')
  })
  .strict();

export type RegistroUsuario = z.input<typeof esquemaRegistroUsuario>;
export type ActualizacionUsuario = z.input<typeof esquemaActualizacionUsuario>;
export type NuevoAdministrador = z.input<typeof esquemaAdministrador>;
