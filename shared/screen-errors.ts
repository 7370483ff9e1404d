import type { TScreenParamId } from "./screen-params";

export type ScreenInputErrorCode =
  | "UnrecognizedUnit"
  | "MissingUnit"
  | "InvalidNumber"
  | "InvalidInteger"
  | "InvalidAspectSyntax"
  | "UnexpectedArgument";

export class ScreenInputError extends Error {
  code: ScreenInputErrorCode;
  param?: TScreenParamId;
  constructor(code: ScreenInputErrorCode, message: string, param?: TScreenParamId) {
    super(message);
    this.code = code;
    this.param = param;
    this.name = "ScreenInputError";
  }

  withParam(param: TScreenParamId): ScreenInputError {
    return new ScreenInputError(this.code, `${param}: ${this.message}`, param);
  }
}
