/**
 * Schema of `pipewright.yml`, validated with TypeBox after parameter
 * substitution. Keys follow the file's snake_case spelling.
 */

import {Type, type Static} from "@sinclair/typebox";

const Scalar = Type.Union([Type.String(), Type.Number(), Type.Boolean()]);

export const ParserNameSchema = Type.Union([
  Type.Literal("go-test"),
  Type.Literal("tap"),
  Type.Literal("plain"),
  Type.Literal("auto"),
]);

const WhenSchema = Type.Union([Type.Literal("on_success"), Type.Literal("always")]);

/** Milliseconds, or a duration string such as "90s", "10m", "1h". */
const DurationSchema = Type.Union([Type.Integer({minimum: 0}), Type.String({pattern: "^\\d+(ms|s|m|h)?$"})]);

const EnvironmentSchema = Type.Record(Type.String(), Scalar);

// ─── Settings ───────────────────────────────────────────────

export const SettingsSchema = Type.Object({
  maxConcurrency: Type.Integer({minimum: 1}),
  fallbackWeight: Type.Number({minimum: 0}),
  imbalanceThreshold: Type.Number({minimum: 1}),
  gracePeriodMs: Type.Integer({minimum: 0}),
  killGraceMs: Type.Integer({minimum: 0}),
  reportDir: Type.String({minLength: 1}),
  timingsFile: Type.String({minLength: 1}),
  recordTimings: Type.Boolean(),
  events: Type.Object({
    enabled: Type.Boolean(),
    port: Type.Integer({minimum: 0, maximum: 65535}),
  }),
});

export type PipelineSettings = Static<typeof SettingsSchema>;

// ─── Parameters ─────────────────────────────────────────────

export const ParameterSchema = Type.Object(
  {
    type: Type.Union([Type.Literal("string"), Type.Literal("integer"), Type.Literal("boolean"), Type.Literal("enum")]),
    default: Type.Optional(Scalar),
    enum: Type.Optional(Type.Array(Type.String(), {minItems: 1})),
    description: Type.Optional(Type.String()),
  },
  {additionalProperties: false},
);

export const ParametersSchema = Type.Record(Type.String({pattern: "^[A-Za-z_][A-Za-z0-9_-]*$"}), ParameterSchema);

export type ParameterDefinition = Static<typeof ParameterSchema>;

// ─── Steps ──────────────────────────────────────────────────

const RunSchema = Type.Object(
  {
    name: Type.Optional(Type.String()),
    command: Type.String({minLength: 1}),
    parser: Type.Optional(ParserNameSchema),
    when: Type.Optional(WhenSchema),
    working_directory: Type.Optional(Type.String()),
    environment: Type.Optional(EnvironmentSchema),
    no_output_timeout: Type.Optional(DurationSchema),
  },
  {additionalProperties: false},
);

const TestShardsSchema = Type.Object(
  {
    name: Type.Optional(Type.String()),
    /** A listing command, or the identifiers themselves */
    list: Type.Union([Type.String({minLength: 1}), Type.Array(Type.String())]),
    exclusions: Type.Optional(Type.String({minLength: 1})),
    command: Type.String({minLength: 1}),
    parallelism: Type.Optional(Type.Integer({minimum: 1})),
    parser: Type.Optional(ParserNameSchema),
    when: Type.Optional(WhenSchema),
    no_output_timeout: Type.Optional(DurationSchema),
  },
  {additionalProperties: false},
);

const BuildConfigurationSchema = Type.Object(
  {
    name: Type.String({minLength: 1}),
    artifact: Type.String({minLength: 1}),
    environment: Type.Optional(EnvironmentSchema),
    working_directory: Type.Optional(Type.String()),
    ignore: Type.Optional(Type.Array(Type.String())),
  },
  {additionalProperties: false},
);

const VerifyDeterminismSchema = Type.Object(
  {
    name: Type.Optional(Type.String()),
    build: Type.String({minLength: 1}),
    placeholder: Type.Optional(Type.String({minLength: 1})),
    configurations: Type.Array(BuildConfigurationSchema),
    parser: Type.Optional(ParserNameSchema),
    when: Type.Optional(WhenSchema),
  },
  {additionalProperties: false},
);

export const StepSchema = Type.Union([
  /** Reference to a named command */
  Type.String({minLength: 1}),
  Type.Object({run: Type.Union([Type.String({minLength: 1}), RunSchema])}, {additionalProperties: false}),
  Type.Object({"test-shards": TestShardsSchema}, {additionalProperties: false}),
  Type.Object({"verify-determinism": VerifyDeterminismSchema}, {additionalProperties: false}),
]);

export type StepDefinition = Static<typeof StepSchema>;
export type RunDefinition = Static<typeof RunSchema>;
export type TestShardsDefinition = Static<typeof TestShardsSchema>;
export type VerifyDeterminismDefinition = Static<typeof VerifyDeterminismSchema>;

// ─── Executors, commands, jobs, workflows ───────────────────

export const ExecutorSchema = Type.Object(
  {
    working_directory: Type.Optional(Type.String()),
    shell: Type.Optional(Type.String({minLength: 1})),
    environment: Type.Optional(EnvironmentSchema),
  },
  {additionalProperties: false},
);

export type ExecutorDefinition = Static<typeof ExecutorSchema>;

const CommandSchema = Type.Object(
  {
    description: Type.Optional(Type.String()),
    steps: Type.Array(StepSchema),
  },
  {additionalProperties: false},
);

const JobSchema = Type.Object(
  {
    executor: Type.Optional(Type.String()),
    working_directory: Type.Optional(Type.String()),
    environment: Type.Optional(EnvironmentSchema),
    requires: Type.Optional(Type.Array(Type.String())),
    parallelism: Type.Optional(Type.Integer({minimum: 1})),
    resources: Type.Optional(Type.Array(Type.String())),
    steps: Type.Array(StepSchema, {minItems: 1}),
  },
  {additionalProperties: false},
);

export type JobDefinition = Static<typeof JobSchema>;

const WorkflowJobOptionsSchema = Type.Object(
  {requires: Type.Optional(Type.Array(Type.String()))},
  {additionalProperties: false},
);

/** `- build` or `- test: {requires: [build]}` */
const WorkflowJobSchema = Type.Union([
  Type.String({minLength: 1}),
  Type.Record(Type.String(), WorkflowJobOptionsSchema, {minProperties: 1, maxProperties: 1}),
]);

const WorkflowSchema = Type.Object({jobs: Type.Array(WorkflowJobSchema, {minItems: 1})}, {additionalProperties: false});

export type WorkflowDefinition = Static<typeof WorkflowSchema>;

export const PipelineFileSchema = Type.Object(
  {
    version: Type.Optional(Type.Literal(1)),
    settings: Type.Optional(Type.Unknown()),
    parameters: Type.Optional(ParametersSchema),
    executors: Type.Optional(Type.Record(Type.String(), ExecutorSchema)),
    commands: Type.Optional(Type.Record(Type.String(), CommandSchema)),
    jobs: Type.Record(Type.String(), JobSchema),
    workflows: Type.Optional(Type.Record(Type.String(), WorkflowSchema)),
  },
  {additionalProperties: false},
);

export type PipelineFile = Static<typeof PipelineFileSchema>;
