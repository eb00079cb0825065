import { plainToInstance } from "class-transformer";
import {
  IsArray,
  IsNotEmpty,
  IsString,
  Matches,
  validateSync,
} from "class-validator";
import { SinkError } from "@logging/domain";

/**
 * HarnessConfigDto - validated shape of the "harness" config namespace.
 */
export class HarnessConfigDto {
  @IsString()
  @IsNotEmpty()
  filePath!: string;

  @IsArray()
  @IsString({ each: true })
  @Matches(/^[^\n]*$/, {
    each: true,
    message: "messages must not contain line terminators",
  })
  messages!: string[];

  /**
   * Convert a raw object into a HarnessConfigDto, throwing INVALID_CONFIG
   * with every constraint message when validation fails.
   */
  static validate(raw: Record<string, unknown>): HarnessConfigDto {
    const config = plainToInstance(HarnessConfigDto, raw);
    const errors = validateSync(config);
    if (errors.length > 0) {
      throw SinkError.invalidConfig(
        errors.flatMap((error) => Object.values(error.constraints ?? {})),
      );
    }
    return config;
  }
}
