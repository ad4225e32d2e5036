import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsNotEmpty,
  IsNumberString,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';
import { trim } from '@/common/dto/transforms';

export class SettingItemsQueryDto {
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  name!: string;
}

/**
 * DTO for site settings
 */
export class SiteSettingDto {
  @MaxLength(50, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  type_name!: string;

  @MaxLength(50, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  site_name!: string;

  @IsOptional()
  @IsString({ message: i18nValidationMessage('validation.STRING') })
  site_desc?: string;

  @MaxLength(255, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  site_url!: string;

  @IsOptional()
  @IsString({ message: i18nValidationMessage('validation.STRING') })
  site_logo?: string;

  @IsOptional()
  @IsString({ message: i18nValidationMessage('validation.STRING') })
  seo_key_words?: string;

  @IsOptional()
  @IsString({ message: i18nValidationMessage('validation.STRING') })
  head_content?: string;

  @IsOptional()
  @IsString({ message: i18nValidationMessage('validation.STRING') })
  footer_content?: string;
}

/**
 * DTO for SMTP settings
 */
export class SmtpSettingDto {
  @MaxLength(50, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  type_name!: string;

  @MaxLength(30, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  address!: string;

  @MaxLength(5, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNumberString({}, { message: i18nValidationMessage('validation.PORT') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  port!: string;

  @IsEmail({}, { message: i18nValidationMessage('validation.EMAIL') })
  @MaxLength(30, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  account!: string;

  @MaxLength(30, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  pwd!: string;

  @MaxLength(30, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  sender!: string;
}
