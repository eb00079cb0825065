import { DynamicModule, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { LoggingModule } from "@logging";
import { HarnessModule } from "@harness";
import { createHarnessConfig } from "@config";

export interface AppModuleOptions {
  /** Backing file for the FileSink; the temp-dir default when omitted. */
  filePath?: string;
}

@Module({})
export class AppModule {
  static forRoot(options: AppModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [createHarnessConfig(options.filePath)],
        }),
        LoggingModule,
        HarnessModule,
      ],
    };
  }
}
