import { registerAs } from "@nestjs/config";
import { tmpdir } from "os";
import { join } from "path";
import { HarnessConfigDto } from "./harness-config.dto";

export const HARNESS_CONFIG = "harness";

export const DEFAULT_FILE_PATH = join(tmpdir(), "outfile_typescript.txt");

/** Fixed, ordered test set sent through every sink. */
export const TEST_MESSAGES: readonly string[] = [
  "Hello, World!",
  "abracadabra",
  "Sayonara!",
];

export type HarnessConfig = Readonly<HarnessConfigDto>;

/**
 * Harness Configuration
 *
 * Resolves the backing file path (CLI argument or the temp-dir default) and
 * the test messages, validated once at load time and exposed through
 * ConfigService under the "harness" namespace.
 */
export const createHarnessConfig = (filePath?: string) =>
  registerAs(HARNESS_CONFIG, (): HarnessConfig =>
    HarnessConfigDto.validate({
      filePath: filePath ?? DEFAULT_FILE_PATH,
      messages: [...TEST_MESSAGES],
    }),
  );
