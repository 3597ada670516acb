import type {ParsedLine, ParserName} from "../shared-types";

export type ConcreteParserName = Exclude<ParserName, "auto">;

/**
 * Common interface for raw-output parsers (go test, TAP, plain text).
 *
 * WHY: The aggregator only cares about "here is a line of output",
 * while the parser handles the framework-specific text format.
 * Parsers are stateful and belong to exactly one output stream.
 */
export interface OutputParser {
  readonly name: ConcreteParserName;

  /**
   * Classify one complete line (without its trailing newline).
   * Parsers that need look-ahead may return results for earlier lines.
   */
  parseLine(line: string): ParsedLine[];

  /**
   * End of stream: release anything still held back.
   */
  flush(): ParsedLine[];
}
