import { tmpdir } from "os";
import { join } from "path";
import { SinkErrorCode } from "@logging/value-objects";
import { HarnessConfigDto } from "./harness-config.dto";
import {
  DEFAULT_FILE_PATH,
  HARNESS_CONFIG,
  TEST_MESSAGES,
  createHarnessConfig,
} from "./harness.config";

describe("harness config", () => {
  it("should register under the harness namespace", () => {
    expect(createHarnessConfig().KEY).toBe(`CONFIGURATION(${HARNESS_CONFIG})`);
  });

  it("should default to a file in the temp directory", () => {
    const config = createHarnessConfig()();

    expect(DEFAULT_FILE_PATH).toBe(join(tmpdir(), "outfile_typescript.txt"));
    expect(config.filePath).toBe(DEFAULT_FILE_PATH);
    expect(config.messages).toEqual([
      "Hello, World!",
      "abracadabra",
      "Sayonara!",
    ]);
  });

  it("should use the given file path", () => {
    expect(createHarnessConfig("/var/tmp/sinks.txt")().filePath).toBe(
      "/var/tmp/sinks.txt",
    );
  });

  it("should hand out a copy of the test messages", () => {
    const config = createHarnessConfig()();

    expect(config.messages).not.toBe(TEST_MESSAGES);
  });

  it("should reject an empty file path", () => {
    expect(() => createHarnessConfig("")()).toThrow(
      "Invalid harness configuration: filePath should not be empty",
    );
  });

  describe("HarnessConfigDto.validate", () => {
    it("should reject messages containing a line terminator", () => {
      expect(() =>
        HarnessConfigDto.validate({
          filePath: "/var/tmp/sinks.txt",
          messages: ["ok", "two\nlines"],
        }),
      ).toThrow(
        expect.objectContaining({
          code: SinkErrorCode.INVALID_CONFIG,
          message:
            "Invalid harness configuration: messages must not contain line terminators",
        }),
      );
    });

    it("should accept messages carrying a carriage return", () => {
      expect(
        HarnessConfigDto.validate({
          filePath: "/var/tmp/sinks.txt",
          messages: ["windows\r", "\r"],
        }).messages,
      ).toEqual(["windows\r", "\r"]);
    });

    it("should return a HarnessConfigDto instance", () => {
      expect(
        HarnessConfigDto.validate({ filePath: "/var/tmp/x", messages: [] }),
      ).toBeInstanceOf(HarnessConfigDto);
    });
  });
});
