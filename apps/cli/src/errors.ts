/** A session whose inputs cannot be read. Fails that session only. */
export class SessionInputError extends Error {
  constructor(
    readonly session: string,
    readonly reason: string
  ) {
    super(`Session ${session}: ${reason}`);
    this.name = "SessionInputError";
  }
}
