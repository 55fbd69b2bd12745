export class InvalidArgumentError extends Error {
  constructor(
    public readonly argument: string,
    reason = "must not be blank",
  ) {
    super(`${argument} ${reason}`);
    this.name = "InvalidArgumentError";
  }
}
