import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { ExitCode, HarnessRunner } from "@harness";

/**
 * The backing file is the first CLI argument, if any.
 */
export function resolveFilePath(argv: readonly string[]): string | undefined {
  return argv[2];
}

/**
 * Run the harness in a Nest application context and map the outcome to an
 * exit code. The context, and with it every sink, is closed before returning.
 */
export async function bootstrap(argv: readonly string[]): Promise<ExitCode> {
  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot({ filePath: resolveFilePath(argv) }),
    { logger: ["error", "warn"] },
  );
  app.enableShutdownHooks();

  try {
    return app.get(HarnessRunner).run();
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  bootstrap(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      new Logger("Bootstrap").error(
        error instanceof Error ? error.message : String(error),
      );
      process.exitCode = ExitCode.FAILURE;
    });
}
