/**
 * Configuracion del gestor de perfiles.
 *
 * Se lee una sola vez al arrancar. Los valores numericos se acotan a rangos
 * seguros para que un `.env` mal escrito no deje el pool sin conexiones.
 */
import dotenv from 'dotenv';
import path from 'node:path';

/**
 * `.env` de la raiz del repositorio, tanto desde `apps/<app>/src` como desde
 * la salida compilada en `dist/apps/<app>/src`.
 */
export function rutaEntornoRaiz(directorio: string): string {
  const raiz = path.resolve(directorio, '..', '..', '..');
  const raizRepositorio = path.basename(raiz) === 'dist' ? path.dirname(raiz) : raiz;
  return path.join(raizRepositorio, '.env');
}

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({
  quiet: true,
  path: [rutaEntornoRaiz(__dirname), path.resolve(process.cwd(), '.env')]
});

type Entorno = Record<string, string | undefined>;

export interface SemillaAdministrador {
  correo: string;
  nombreUsuario: string;
  contrasena: string;
  nombre: string;
  apellido: string;
  cuentaActual: string;
  forzar: boolean;
}

export interface Configuracion {
  entorno: string;
  mongoUri: string;
  baseDatos: string;
  poolMaximo: number;
  poolMinimo: number;
  esperaMaximaMs: number;
  bcryptRondas: number;
  semillaAdmin: SemillaAdministrador | null;
}

export function parsearNumeroSeguro(valor: unknown, porDefecto: number, { min, max }: { min?: number; max?: number } = {}) {
  if (valor === undefined || valor === null || valor === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return Math.trunc(clamped);
}

function leerSemillaAdministrador(env: Entorno): SemillaAdministrador | null {
  const correo = String(env.SEED_ADMIN_EMAIL ?? '').trim().toLowerCase();
  const contrasena = String(env.SEED_ADMIN_PASSWORD ?? '');
  if (!correo || !contrasena) return null;

  return {
    correo,
    nombreUsuario: String(env.SEED_ADMIN_USERNAME ?? '').trim() || correo.split('@')[0],
    contrasena,
    nombre: String(env.SEED_ADMIN_NOMBRE ?? 'Administrador').trim(),
    apellido: String(env.SEED_ADMIN_APELLIDO ?? 'General').trim(),
    cuentaActual: String(env.SEED_ADMIN_CUENTA ?? '').trim(),
    forzar: String(env.SEED_ADMIN_FORCE ?? '').toLowerCase() === 'true'
  };
}

export function construirConfiguracion(env: Entorno): Configuracion {
  const entorno = env.NODE_ENV ?? 'development';
  const mongoUriRaw = String(env.MONGODB_URI ?? env.MONGO_URI ?? '').trim();
  if (entorno === 'production' && !mongoUriRaw) {
    throw new Error('MONGODB_URI es requerido en producción');
  }

  const poolMaximo = parsearNumeroSeguro(env.MONGODB_POOL_MAX, 10, { min: 1, max: 500 });
  // El minimo nunca supera al maximo: el driver rechaza minPoolSize > maxPoolSize.
  const poolMinimo = parsearNumeroSeguro(env.MONGODB_POOL_MIN, 0, { min: 0, max: poolMaximo });

  return {
    entorno,
    mongoUri: mongoUriRaw || 'mongodb://127.0.0.1:27017',
    baseDatos: String(env.MONGODB_BASE_DATOS ?? '').trim() || 'gestion_perfiles',
    poolMaximo,
    poolMinimo,
    esperaMaximaMs: parsearNumeroSeguro(env.MONGODB_ESPERA_MAX_MS, 5000, { min: 100, max: 120_000 }),
    bcryptRondas: parsearNumeroSeguro(env.BCRYPT_RONDAS, 10, { min: 4, max: 15 }),
    semillaAdmin: leerSemillaAdministrador(env)
  };
}

export const configuracion = construirConfiguracion(process.env);
