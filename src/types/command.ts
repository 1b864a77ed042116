/**
 * A structured command ready for execution.
 * The slapt-get builder never produces raw command strings; it produces Command objects.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
}
