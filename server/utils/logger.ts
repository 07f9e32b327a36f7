import { consola, type ConsolaInstance } from 'consola'

let root: ConsolaInstance = consola.withTag('study-chat')

export function configureLogger(level: number): void {
  root = consola.create({ level }).withTag('study-chat')
}

// Se resuelve en cada llamada para respetar el nivel configurado al arrancar
export function useLogger(tag: string): ConsolaInstance {
  return root.withTag(tag)
}
