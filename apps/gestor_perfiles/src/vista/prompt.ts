import type { Interface } from 'node:readline';

export async function preguntar(rl: Interface, pregunta: string): Promise<string> {
  const respuesta = await new Promise<string>((resolve) => {
    rl.question(pregunta, (valor) => resolve(valor));
  });
  return respuesta.trim();
}

export async function preguntarRequerido(rl: Interface, pregunta: string): Promise<string> {
  while (true) {
    const respuesta = await preguntar(rl, pregunta);
    if (respuesta.length > 0) {
      return respuesta;
    }
    console.log('El valor no puede estar vacio. Intenta de nuevo.');
  }
}

/** Devuelve `actual` si se pulsa Enter sin escribir nada. */
export async function preguntarConValor(rl: Interface, pregunta: string, actual: string): Promise<string> {
  const respuesta = await preguntar(rl, `${pregunta} [${actual}]: `);
  return respuesta || actual;
}

export async function elegirOpcion<T extends string>(
  rl: Interface,
  pregunta: string,
  opciones: readonly T[],
  porDefecto?: T
): Promise<T> {
  const lista = opciones.join('/');
  while (true) {
    const respuesta = (await preguntar(rl, `${pregunta} (${lista})${porDefecto ? ` [${porDefecto}]` : ''}: `)).toUpperCase();
    if (!respuesta && porDefecto) return porDefecto;
    const elegida = opciones.find((opcion) => opcion.toUpperCase() === respuesta);
    if (elegida) return elegida;
    console.log(`Opcion no valida. Usa una de: ${lista}`);
  }
}
