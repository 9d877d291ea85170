export type ErrorData = Record<string, unknown>;

export class ErrorWithData extends Error {
  public data: ErrorData;

  constructor(message: string, data: ErrorData) {
    // Restore the prototype chain lost when extending Error under ES5 targets
    const trueProto = new.target.prototype;
    super(message);
    Object.setPrototypeOf(this, trueProto);
    this.name = this.constructor.name;

    this.data = data;
  }
}
