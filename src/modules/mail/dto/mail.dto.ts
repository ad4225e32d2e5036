import { Transform } from 'class-transformer';
import { IsEmail, IsNotEmpty, MaxLength } from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';
import { trim } from '@/common/dto/transforms';

/**
 * DTO for sending a test mail through the configured SMTP relay
 */
export class TestMailDto {
  @MaxLength(30, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  sender!: string;

  @IsEmail({}, { message: i18nValidationMessage('validation.EMAIL') })
  @MaxLength(30, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  receive_email!: string;

  @MaxLength(100, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  @Transform(trim)
  title!: string;

  @MaxLength(1200, { message: i18nValidationMessage('validation.MAX_LENGTH') })
  @IsNotEmpty({ message: i18nValidationMessage('validation.NOT_EMPTY') })
  content!: string;
}
