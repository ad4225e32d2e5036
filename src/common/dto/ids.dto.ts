import { Transform } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsInt, Min } from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';
import { splitIds } from './transforms';

/** `?ids=1,2,3` for batch deletes. */
export class IdsQueryDto {
  @Transform(splitIds)
  @IsArray({ message: i18nValidationMessage('validation.IDS') })
  @ArrayNotEmpty({ message: i18nValidationMessage('validation.IDS') })
  @IsInt({ each: true, message: i18nValidationMessage('validation.IDS') })
  @Min(1, { each: true, message: i18nValidationMessage('validation.IDS') })
  ids!: number[];
}
