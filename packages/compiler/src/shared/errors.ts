/** Internal invariant violations. These abort generation; template mistakes are diagnostics. */
export const TcbErrorCode = {
  /** A node was looked up in a scope chain that never registered it. */
  UNRESOLVED_NODE: "TCB_UNRESOLVED_NODE",
  /** A resolved op produced no identifier. */
  EMPTY_OP_RESULT: "TCB_EMPTY_OP_RESULT",
} as const;

export type TcbErrorCode = (typeof TcbErrorCode)[keyof typeof TcbErrorCode];

export class TcbInternalError extends Error {
  constructor(
    message: string,
    public readonly code: TcbErrorCode,
    public readonly details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "TcbInternalError";
  }
}

export function assertUnreachable(value: never, what: string): never {
  throw new Error(`Unexpected ${what}: ${JSON.stringify(value)}`);
}
