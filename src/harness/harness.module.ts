import { Module } from "@nestjs/common";
import { HarnessRunner } from "./harness.runner";

@Module({
  providers: [HarnessRunner],
  exports: [HarnessRunner],
})
export class HarnessModule {}
