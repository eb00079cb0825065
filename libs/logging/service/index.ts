export { SinkRegistry } from "./sink-registry.service";
export { ConsistencyHarnessService } from "./consistency-harness.service";
