export { HarnessModule } from "./harness.module";
export { HarnessRunner } from "./harness.runner";
export { ExitCode } from "./exit-code.vo";
