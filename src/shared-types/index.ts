export * from "./shared-types";
