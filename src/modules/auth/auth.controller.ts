import { Public } from '@/common/decorators/public.decorator';
import { ServiceResult } from '@/common/types/api-result.type';
import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { CaptchaChallenge } from '../captcha/captcha.service';
import { AuthService } from './auth.service';
import {
  ForgetPasswordDto,
  LoginDto,
  RegisterDto,
  ResetPasswordDto,
} from './dto/auth.dto';
import { LoginData } from './types/auth.type';

/**
 * Handles all authentication flows:
 *
 *  ├─ POST   /auth/register
 *  ├─ POST   /auth/login        ← requires a captcha from GET /auth/captcha
 *  ├─ GET    /auth/captcha
 *  ├─ POST   /auth/pwd/forget   ← mails a verification code
 *  └─ POST   /auth/pwd/reset    ← sets a new password with that code
 */
@Public()
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  @HttpCode(HttpStatus.OK)
  register(@Body() dto: RegisterDto): Promise<ServiceResult> {
    return this.authService.register(dto);
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(@Body() dto: LoginDto): Promise<ServiceResult<LoginData>> {
    return this.authService.login(dto);
  }

  @Get('captcha')
  createCaptcha(): Promise<ServiceResult<CaptchaChallenge>> {
    return this.authService.createCaptcha();
  }

  /**
   * POST /auth/pwd/forget
   *
   * Asking again while a code is still valid resends the same code.
   */
  @Post('pwd/forget')
  @HttpCode(HttpStatus.OK)
  forgetPassword(@Body() dto: ForgetPasswordDto): Promise<ServiceResult> {
    return this.authService.forgetPassword(dto);
  }

  @Post('pwd/reset')
  @HttpCode(HttpStatus.OK)
  resetPassword(@Body() dto: ResetPasswordDto): Promise<ServiceResult> {
    return this.authService.resetPassword(dto);
  }
}
