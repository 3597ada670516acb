export * from "./adapter.interface";
export {GoTestParser} from "./go-test/go-test.parser";
export {TapParser} from "./tap/tap.parser";
export {PlainParser} from "./plain/plain.parser";
export {AdapterAutoDetector} from "./auto-detector";
