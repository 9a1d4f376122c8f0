/** The slice of a structured logger the use cases write to (pino fits it). */
export interface UseCaseLogger {
  info(context: object, message: string): void;
}
