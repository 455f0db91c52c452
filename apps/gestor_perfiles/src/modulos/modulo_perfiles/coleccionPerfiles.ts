/**
 * Acceso a la coleccion `profiles`.
 *
 * `ColeccionPerfiles` es lo unico que el almacen necesita de la base de datos.
 * Devuelve documentos crudos (lean); la conversion a dominio vive en
 * `mapeoPerfil`. Las pruebas usan una implementacion en memoria.
 */
import type { Connection } from 'mongoose';
import type { PoolConexiones } from '../../infraestructura/baseDatos/poolConexiones';
import { obtenerModelosPerfil, type DocumentoAdministrador, type DocumentoUsuario, type ModelosPerfil } from './modeloPerfil';

export type CambiosUsuario = Partial<Omit<DocumentoUsuario, 'email' | 'username'>>;

export type DocumentoNuevo =
  | ({ type: 'User' } & DocumentoUsuario)
  | ({ type: 'Admin' } & DocumentoAdministrador);

export interface ColeccionPerfiles {
  existeCorreo(email: string): Promise<boolean>;
  existeNombreUsuario(username: string): Promise<boolean>;
  /** Primer documento cuyo email o username coincide con la credencial. */
  buscarPorCredencial(credencial: string): Promise<object | null>;
  buscarUsuarioPorId(id: string): Promise<object | null>;
  listarUsuarios(): Promise<object[]>;
  /** Inserta y devuelve el `_id` generado en hexadecimal. */
  insertar(documento: DocumentoNuevo): Promise<string>;
  /** `true` si algun campo cambio de valor. */
  actualizarUsuario(id: string, cambios: CambiosUsuario): Promise<boolean>;
  /** `true` si se elimino un documento. */
  eliminar(id: string): Promise<boolean>;
}

export class ColeccionPerfilesMongo implements ColeccionPerfiles {
  private preparados: Promise<ModelosPerfil> | null = null;

  constructor(private readonly pool: PoolConexiones) {}

  private modelos(): Promise<ModelosPerfil> {
    // Pool cerrado: obtenerBaseDatos rechaza con POOL_CERRADO.
    if (this.pool.estaCerrado) this.preparados = null;
    if (!this.preparados) {
      this.preparados = this.pool
        .obtenerBaseDatos()
        .then((conexion) => this.prepararModelos(conexion))
        .catch((error: unknown) => {
          // Se permite reintentar en la siguiente operacion.
          this.preparados = null;
          throw error;
        });
    }
    return this.preparados;
  }

  private async prepararModelos(conexion: Connection): Promise<ModelosPerfil> {
    const modelos = obtenerModelosPerfil(conexion);
    // Espera a que existan los indices unicos de email/username.
    await modelos.Perfil.init();
    return modelos;
  }

  async existeCorreo(email: string): Promise<boolean> {
    const { Perfil } = await this.modelos();
    return (await Perfil.countDocuments({ email }).exec()) > 0;
  }

  async existeNombreUsuario(username: string): Promise<boolean> {
    const { Perfil } = await this.modelos();
    return (await Perfil.countDocuments({ username }).exec()) > 0;
  }

  async buscarPorCredencial(credencial: string): Promise<object | null> {
    const { Perfil } = await this.modelos();
    return Perfil.findOne({
      $or: [{ email: credencial.trim().toLowerCase() }, { username: credencial }]
    })
      .lean()
      .exec();
  }

  async buscarUsuarioPorId(id: string): Promise<object | null> {
    const { Usuario } = await this.modelos();
    return Usuario.findById(id).lean().exec();
  }

  async listarUsuarios(): Promise<object[]> {
    const { Usuario } = await this.modelos();
    return Usuario.find().lean().exec();
  }

  async insertar(documento: DocumentoNuevo): Promise<string> {
    const { Usuario, Administrador } = await this.modelos();
    const creado =
      documento.type === 'Admin' ? await Administrador.create(documento) : await Usuario.create(documento);
    return String(creado._id);
  }

  async actualizarUsuario(id: string, cambios: CambiosUsuario): Promise<boolean> {
    const { Usuario } = await this.modelos();
    const resultado = await Usuario.updateOne({ _id: id }, { $set: cambios }).exec();
    return resultado.modifiedCount > 0;
  }

  async eliminar(id: string): Promise<boolean> {
    const { Perfil } = await this.modelos();
    const resultado = await Perfil.deleteOne({ _id: id }).exec();
    return resultado.deletedCount > 0;
  }
}
