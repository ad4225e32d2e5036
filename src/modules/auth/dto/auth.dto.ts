import { AUTH_CONSTANTS } from '@/common/constants/auth.constants';
import { trim, trimLower } from '@/common/dto/transforms';
import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsNotEmpty,
  IsUrl,
  Length,
  Matches,
  MaxLength,
} from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';

const USERNAME_PATTERN = /^[\p{L}\p{N}_]+$/u;
const VERIFY_CODE_PATTERN = new RegExp(
  `^[A-Za-z0-9]{${AUTH_CONSTANTS.VERIFY_CODE_LENGTH}}$`,
);

/**
 * DTO for user registration
 */
export class RegisterDto {
  @Matches(USERNAME_PATTERN, {
    message: i18nValidationMessage('validation.USERNAME_FORMAT'),
  })
  @Length(3, 30, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  username!: string;

  @Length(6, 128, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  pwd!: string;

  @IsEmail(
    {},
    {
      message: i18nValidationMessage('validation.EMAIL'),
    },
  )
  @MaxLength(128, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trimLower)
  email!: string;

  @MaxLength(50, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  site_name!: string;

  @IsUrl(
    { require_tld: false },
    {
      message: i18nValidationMessage('validation.URL'),
    },
  )
  @MaxLength(255, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  site_url!: string;
}

/**
 * DTO for login
 */
export class LoginDto {
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  username!: string;

  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  pwd!: string;

  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  captcha_id!: string;

  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  captcha_val!: string;
}

/**
 * DTO for forgot password
 */
export class ForgetPasswordDto {
  @IsEmail(
    {},
    {
      message: i18nValidationMessage('validation.EMAIL'),
    },
  )
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trimLower)
  email!: string;
}

/**
 * DTO for resetting the password with an emailed code
 */
export class ResetPasswordDto {
  @IsEmail(
    {},
    {
      message: i18nValidationMessage('validation.EMAIL'),
    },
  )
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trimLower)
  email!: string;

  @Matches(VERIFY_CODE_PATTERN, {
    message: i18nValidationMessage('validation.CODE_FORMAT'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  verify_code!: string;

  @Length(6, 128, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  pwd!: string;
}
