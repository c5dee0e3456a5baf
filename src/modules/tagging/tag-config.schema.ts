import { Type } from 'class-transformer';
import { IsInt, IsObject, IsOptional, IsString, Max, Min, ValidateNested } from 'class-validator';

export class TagSettingsSection {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(12)
  sequence_digits?: number;

  @IsOptional()
  @IsString()
  separator?: string;
}

/**
 * Tag prefix document as stored on disk.
 *
 * ```json
 * {
 *   "defaults": { "asset": "ASSET", "component": "COMP" },
 *   "tag_settings": { "sequence_digits": 5, "separator": "" },
 *   "companies": {
 *     "AC": {
 *       "asset": "ACME",
 *       "departments": { "Engineering": { "asset": "ENG" } }
 *     }
 *   }
 * }
 * ```
 *
 * Prefix sections are free-form: values that are not strings are ignored at
 * resolution time rather than rejected here.
 */
export class TagPrefixDocument {
  @IsOptional()
  @IsObject()
  defaults?: Record<string, unknown>;

  @IsOptional()
  @ValidateNested()
  @Type(() => TagSettingsSection)
  tag_settings?: TagSettingsSection;

  @IsOptional()
  @IsObject()
  companies?: Record<string, unknown>;
}
