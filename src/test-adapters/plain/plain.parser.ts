import type {ParsedLine} from "../../shared-types";
import type {OutputParser} from "../adapter.interface";

/** PlainParser — No test format: every non-empty line is diagnostic text. */
export class PlainParser implements OutputParser {
  readonly name = "plain" as const;

  parseLine(line: string): ParsedLine[] {
    return line.trim() === "" ? [{kind: "noise"}] : [{kind: "aux", line}];
  }

  flush(): ParsedLine[] {
    return [];
  }
}
