/**
 * Vista de consola: menus de inicio de sesion, registro y gestion de usuarios.
 *
 * Solo hace E/S; toda decision pasa por `ControladorPerfiles`.
 */
import type { Interface } from 'node:readline';
import type { ControladorPerfiles, Resultado } from '../controlador/controladorPerfiles';
import { GENEROS, type Administrador, type Usuario } from '../modulos/modulo_perfiles/tiposPerfil';
import { describirPerfil, formatearTablaUsuarios } from './formato';
import { elegirOpcion, preguntar, preguntarConValor, preguntarRequerido } from './prompt';

function informar<T>(resultado: Resultado<T>, exito: string): resultado is { ok: true; valor: T } {
  if (resultado.ok) {
    console.log(exito);
    return true;
  }
  console.log(`Error: ${resultado.mensaje}`);
  return false;
}

export class VistaConsola {
  constructor(
    private readonly rl: Interface,
    private readonly controlador: ControladorPerfiles
  ) {}

  async ejecutar(): Promise<void> {
    console.log('=== Gestion de perfiles ===');
    let continuar = true;
    while (continuar) {
      const perfil = this.controlador.perfilActual;
      if (!perfil) continuar = await this.menuInicio();
      else if (perfil.tipo === 'Admin') continuar = await this.menuAdministrador(perfil);
      else continuar = await this.menuUsuario(perfil);
    }
  }

  private async menuInicio(): Promise<boolean> {
    console.log('\n1) Iniciar sesion\n2) Registrarse\n0) Salir');
    const opcion = await preguntar(this.rl, '> ');
    if (opcion === '1') await this.iniciarSesion();
    else if (opcion === '2') await this.registrarse();
    else if (opcion === '0') return false;
    return true;
  }

  private async menuUsuario(usuario: Usuario): Promise<boolean> {
    console.log(`\n${describirPerfil(usuario)}`);
    console.log('\n1) Modificar mis datos\n2) Eliminar mi cuenta\n3) Cerrar sesion\n0) Salir');
    const opcion = await preguntar(this.rl, '> ');
    if (opcion === '1') await this.modificarUsuario(usuario);
    else if (opcion === '2') await this.eliminarUsuario(usuario.id);
    else if (opcion === '3') this.controlador.cerrarSesion();
    else if (opcion === '0') return false;
    return true;
  }

  private async menuAdministrador(administrador: Administrador): Promise<boolean> {
    console.log(`\n${describirPerfil(administrador)}`);
    console.log('\n1) Listar usuarios\n2) Modificar usuario\n3) Eliminar usuario\n4) Cerrar sesion\n0) Salir');
    const opcion = await preguntar(this.rl, '> ');
    if (opcion === '1') await this.listarUsuarios();
    else if (opcion === '2') await this.modificarUsuarioPorId();
    else if (opcion === '3') await this.eliminarUsuario(await preguntarRequerido(this.rl, 'Id del usuario: '));
    else if (opcion === '4') this.controlador.cerrarSesion();
    else if (opcion === '0') return false;
    return true;
  }

  private async iniciarSesion(): Promise<void> {
    const credencial = await preguntarRequerido(this.rl, 'Correo o usuario: ');
    const contrasena = await preguntarRequerido(this.rl, 'Contrasena: ');
    const resultado = await this.controlador.iniciarSesion(credencial, contrasena);
    if (informar(resultado, 'Sesion iniciada.')) {
      console.log(`Bienvenido, ${resultado.valor.nombre}.`);
    }
  }

  private async registrarse(): Promise<void> {
    const resultado = await this.controlador.registrar({
      correo: await preguntarRequerido(this.rl, 'Correo: '),
      nombreUsuario: await preguntarRequerido(this.rl, 'Nombre de usuario: '),
      contrasena: await preguntarRequerido(this.rl, 'Contrasena: '),
      nombre: await preguntarRequerido(this.rl, 'Nombre: '),
      apellido: await preguntarRequerido(this.rl, 'Apellido: '),
      telefono: await preguntar(this.rl, 'Telefono: '),
      genero: await elegirOpcion(this.rl, 'Genero', GENEROS),
      tarjeta: await preguntar(this.rl, 'Tarjeta: ')
    });
    if (informar(resultado, 'Usuario registrado. Ya puedes iniciar sesion.')) {
      console.log(`Id asignado: ${resultado.valor.id}`);
    }
  }

  private async listarUsuarios(): Promise<Usuario[]> {
    const resultado = await this.controlador.listarUsuarios();
    if (!resultado.ok) {
      console.log(`Error: ${resultado.mensaje}`);
      return [];
    }
    console.log(formatearTablaUsuarios(resultado.valor));
    return resultado.valor;
  }

  private async modificarUsuarioPorId(): Promise<void> {
    const usuarios = await this.listarUsuarios();
    if (usuarios.length === 0) return;
    const id = await preguntarRequerido(this.rl, 'Id del usuario: ');
    const usuario = usuarios.find((candidato) => candidato.id === id);
    if (!usuario) {
      console.log('Error: No existe un usuario con ese id.');
      return;
    }
    await this.modificarUsuario(usuario);
  }

  private async modificarUsuario(usuario: Usuario): Promise<void> {
    console.log('Pulsa Enter para conservar el valor actual.');
    const resultado = await this.controlador.actualizarUsuario({
      id: usuario.id,
      contrasena: await preguntar(this.rl, 'Nueva contrasena (vacio para no cambiarla): '),
      nombre: await preguntarConValor(this.rl, 'Nombre', usuario.nombre),
      apellido: await preguntarConValor(this.rl, 'Apellido', usuario.apellido),
      telefono: await preguntarConValor(this.rl, 'Telefono', usuario.telefono),
      genero: await elegirOpcion(this.rl, 'Genero', GENEROS, usuario.genero),
      tarjeta: await preguntarConValor(this.rl, 'Tarjeta', usuario.tarjeta)
    });
    informar(resultado, 'Datos actualizados.');
  }

  private async eliminarUsuario(id: string): Promise<void> {
    const confirmacion = await preguntar(this.rl, `Eliminar ${id}? (s/N): `);
    if (confirmacion.toLowerCase() !== 's') return;
    informar(await this.controlador.eliminarUsuario(id), 'Perfil eliminado.');
  }
}
