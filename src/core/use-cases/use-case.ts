/**
 * Contrato común de las consultas: reciben su contexto en `execute` y no dependen de
 * frameworks ni de detalles de infraestructura.
 */
export interface UseCase<Input, Output> {
  execute(input: Input): Promise<Output>;
}

/**
 * Crea una instancia nueva por invocación. Los comandos guardan estado mutable, por
 * lo que los controladores no deben compartir instancias entre peticiones.
 */
export type UseCaseFactory<T> = () => T;
