export * from "./harness.config";
export { HarnessConfigDto } from "./harness-config.dto";
