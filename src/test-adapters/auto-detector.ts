import type {ParsedLine, ParserName} from "../shared-types";
import type {ConcreteParserName, OutputParser} from "./adapter.interface";
import {GoTestParser} from "./go-test/go-test.parser";
import {PlainParser} from "./plain/plain.parser";
import {TapParser} from "./tap/tap.parser";

const GO_TEST_HINTS = [
  /^=== RUN\s/,
  /^\s*--- (PASS|FAIL|SKIP): /,
  /^ok\s+\S+\s+(\d+(\.\d+)?s|\(cached\))/,
  /^\?\s+\S+\s+\[no test files\]/,
  /^FAIL\s+\S+\s+(\d+(\.\d+)?s|\[)/,
];
const TAP_HINTS = [/^TAP version \d+/, /^(not )?ok \d+\b/, /^1\.\.\d+$/];

/** Lines held back before giving up on detection and treating the stream as plain text. */
const MAX_UNDETECTED_LINES = 200;

export class AdapterAutoDetector {
  /**
   * Detect the output format from a single line.
   *
   * Strategy:
   * 1. go test markers (=== RUN, --- PASS:, ok <pkg> <time>)
   * 2. TAP markers (TAP version, ok <n>, plan line)
   * 3. null when the line says nothing about the format
   */
  static detectFormat(line: string): ConcreteParserName | null {
    if (GO_TEST_HINTS.some((re) => re.test(line))) return "go-test";
    if (TAP_HINTS.some((re) => re.test(line))) return "tap";
    return null;
  }

  static create(name: ParserName): OutputParser {
    switch (name) {
      case "go-test":
        return new GoTestParser();
      case "tap":
        return new TapParser();
      case "plain":
        return new PlainParser();
      case "auto":
        return new DetectingParser();
    }
  }
}

/**
 * Buffers lines until one identifies the format, then replays them
 * through the detected parser.
 */
class DetectingParser implements OutputParser {
  private delegate: OutputParser | null = null;
  private buffered: string[] = [];

  get name(): ConcreteParserName {
    return this.delegate?.name ?? "plain";
  }

  parseLine(line: string): ParsedLine[] {
    if (this.delegate) {
      return this.delegate.parseLine(line);
    }

    this.buffered.push(line);
    const detected = AdapterAutoDetector.detectFormat(line);
    if (detected) {
      return this.replay(AdapterAutoDetector.create(detected));
    }
    if (this.buffered.length >= MAX_UNDETECTED_LINES) {
      return this.replay(new PlainParser());
    }
    return [];
  }

  flush(): ParsedLine[] {
    const replayed = this.delegate ? [] : this.replay(new PlainParser());
    return [...replayed, ...(this.delegate?.flush() ?? [])];
  }

  private replay(parser: OutputParser): ParsedLine[] {
    this.delegate = parser;
    const lines = this.buffered;
    this.buffered = [];
    return lines.flatMap((l) => parser.parseLine(l));
  }
}
