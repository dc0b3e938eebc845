import type { SinkContractErrorPayload } from "./types.js";

export class SinkContractError extends Error {
  readonly payload: SinkContractErrorPayload;

  constructor(payload: SinkContractErrorPayload) {
    super(
      `Sink contract violated: ${payload.code} in ${payload.operation}${
        payload.nodeKind === undefined ? "" : ` node=${payload.nodeKind}`
      }`
    );
    this.name = "SinkContractError";
    this.payload = payload;
  }
}

export function failContract(payload: SinkContractErrorPayload): never {
  throw new SinkContractError(payload);
}
