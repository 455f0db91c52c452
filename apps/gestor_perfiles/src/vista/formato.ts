import { rellenarDerecha } from '../compartido/utilidades/texto';
import type { Genero, Perfil, Usuario } from '../modulos/modulo_perfiles/tiposPerfil';

const ETIQUETAS_GENERO: Record<Genero, string> = {
  MALE: 'Hombre',
  FEMALE: 'Mujer',
  OTHER: 'Otro'
};

const COLUMNAS: Array<{ titulo: string; ancho: number; valor: (usuario: Usuario) => string }> = [
  { titulo: 'ID', ancho: 24, valor: (u) => u.id },
  { titulo: 'USUARIO', ancho: 16, valor: (u) => u.nombreUsuario },
  { titulo: 'CORREO', ancho: 26, valor: (u) => u.correo },
  { titulo: 'NOMBRE', ancho: 24, valor: (u) => `${u.nombre} ${u.apellido}` },
  { titulo: 'TELEFONO', ancho: 12, valor: (u) => u.telefono },
  { titulo: 'GENERO', ancho: 7, valor: (u) => ETIQUETAS_GENERO[u.genero] },
  { titulo: 'TARJETA', ancho: 19, valor: (u) => u.tarjeta }
];

export function formatearGenero(genero: Genero): string {
  return ETIQUETAS_GENERO[genero];
}

export function formatearTablaUsuarios(usuarios: Usuario[]): string {
  if (usuarios.length === 0) return 'No hay usuarios registrados.';

  const fila = (celdas: string[]) =>
    celdas
      .map((celda, indice) => rellenarDerecha(celda, COLUMNAS[indice].ancho))
      .join('  ')
      .trimEnd();

  const lineas = [fila(COLUMNAS.map((columna) => columna.titulo))];
  for (const usuario of usuarios) {
    lineas.push(fila(COLUMNAS.map((columna) => columna.valor(usuario))));
  }
  return lineas.join('\n');
}

export function describirPerfil(perfil: Perfil): string {
  const base = [
    `Usuario:  ${perfil.nombreUsuario}`,
    `Correo:   ${perfil.correo}`,
    `Nombre:   ${perfil.nombre} ${perfil.apellido}`,
    `Telefono: ${perfil.telefono || '-'}`
  ];
  if (perfil.tipo === 'Admin') {
    return ['[Administrador]', ...base, `Cuenta:   ${perfil.cuentaActual || '-'}`].join('\n');
  }
  return [
    '[Usuario]',
    ...base,
    `Genero:   ${formatearGenero(perfil.genero)}`,
    `Tarjeta:  ${perfil.tarjeta || '-'}`
  ].join('\n');
}
