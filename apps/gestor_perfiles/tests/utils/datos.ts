// Datos de prueba compartidos.
import { documentoDeAdministrador } from '../../src/modulos/modulo_perfiles/mapeoPerfil';
import { crearHash } from '../../src/modulos/modulo_perfiles/servicioHash';
import type { RegistroUsuario } from '../../src/modulos/modulo_perfiles/validacionesPerfiles';
import type { ColeccionPerfilesMemoria } from './coleccionMemoria';

export function datosUsuario(cambios: Partial<RegistroUsuario> = {}): RegistroUsuario {
  return {
    correo: 'a@x.com',
    nombreUsuario: 'alice',
    contrasena: 'p',
    nombre: 'Alice',
    apellido: 'Lopez',
    telefono: '600111222',
    genero: 'FEMALE',
    tarjeta: '4000-0000-0000-0001',
    ...cambios
  };
}

export const CONTRASENA_ADMIN = 'test-secret';

export async function insertarAdministrador(coleccion: ColeccionPerfilesMemoria): Promise<string> {
  const hash = await crearHash(CONTRASENA_ADMIN);
  return coleccion.insertar(
    documentoDeAdministrador(
      {
        correo: 'root@x.com',
        nombreUsuario: 'root',
        nombre: 'Rosa',
        apellido: 'Admin',
        telefono: '',
        cuentaActual: 'ES00-0001'
      },
      hash
    )
  );
}
