import { AppCacheService } from '@/cache/cache.service';
import {
  AUTH_CONSTANTS,
  CACHE_KEYS,
  SETTING_GROUPS,
} from '@/common/constants/auth.constants';
import { ServerErrorException } from '@/common/exceptions/server-error.exception';
import { translate, MessageOptions } from '@/common/i18n/translate';
import { ServiceResult } from '@/common/types/api-result.type';
import { JwtPayload } from '@/common/types/jwt.type';
import { isDuplicateEntryError } from '@/common/utils/query-error';
import { createRandomCode } from '@/common/utils/random-code';
import { CaptchaChallenge, CaptchaService } from '@/modules/captcha/captcha.service';
import { MailService } from '@/modules/mail/mail.service';
import { SettingService } from '@/modules/setting/setting.service';
import { User } from '@/modules/user/entities/user.entity';
import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { InjectRepository } from '@nestjs/typeorm';
import { hash, verify } from 'argon2';
import { I18nService } from 'nestjs-i18n';
import { DataSource, Repository } from 'typeorm';
import {
  ForgetPasswordDto,
  LoginDto,
  RegisterDto,
  ResetPasswordDto,
} from './dto/auth.dto';
import { LoginData } from './types/auth.type';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly i18n: I18nService,
    @InjectRepository(User)
    private readonly users: Repository<User>,
    private readonly dataSource: DataSource,
    private readonly jwtService: JwtService,
    private readonly config: ConfigService,
    private readonly mailService: MailService,
    private readonly cache: AppCacheService,
    private readonly captchaService: CaptchaService,
    private readonly settingService: SettingService,
  ) {}

  // ============================================================================
  // REGISTRATION
  // ============================================================================

  /**
   * Creates the account and its default site-settings group.
   *
   * Steps:
   *  1. Reject a username that is already taken.
   *  2. In one transaction: persist the user with an argon2 hash, then create
   *     the site-settings group and upsert type_name / site_name / site_url.
   *     A concurrent registration that wins the unique index also ends in
   *     ConflictException.
   *
   * @throws ConflictException   Username already registered.
   */
  async register(dto: RegisterDto): Promise<ServiceResult> {
    const existing = await this.users.findOne({
      where: { username: dto.username },
      select: { id: true },
    });
    if (existing) {
      throw new ConflictException(this.t('auth.errors.usernameTaken'));
    }

    const pwd = await hash(dto.pwd);

    try {
      await this.dataSource.transaction(async (manager) => {
        const users = manager.getRepository(User);
        await users.save(
          users.create({ username: dto.username, pwd, email: dto.email }),
        );

        await this.settingService.saveGroup(
          SETTING_GROUPS.SITE,
          {
            type_name: SETTING_GROUPS.SITE,
            site_name: dto.site_name,
            site_url: dto.site_url,
          },
          manager,
        );
      });
    } catch (error) {
      if (isDuplicateEntryError(error)) {
        throw new ConflictException(this.t('auth.errors.usernameTaken'));
      }
      throw error;
    }

    this.logger.log(`User ${dto.username} registered`);
    return { message: this.t('auth.success.registered') };
  }

  // ============================================================================
  // LOGIN
  // ============================================================================

  /**
   * Verifies the captcha (consumed either way), then the credentials, and
   * issues a bearer token.
   *
   * @throws BadRequestException   Wrong captcha, unknown user or wrong password.
   */
  async login(dto: LoginDto): Promise<ServiceResult<LoginData>> {
    const captchaOk = await this.captchaService.verify(
      dto.captcha_id,
      dto.captcha_val,
    );
    if (!captchaOk) {
      throw new BadRequestException(this.t('auth.errors.captchaInvalid'));
    }

    const user = await this.users.findOne({
      where: { username: dto.username },
    });
    if (!user) {
      throw new BadRequestException(this.t('auth.errors.userNotFound'));
    }

    if (!(await verify(user.pwd, dto.pwd))) {
      throw new BadRequestException(this.t('auth.errors.wrongPassword'));
    }

    const payload: JwtPayload = {
      username: user.username,
      userImg: user.userImg,
    };
    const token = await this.jwtService.signAsync(payload, {
      expiresIn: this.config.get<number>('jwt.expiresIn', 86400),
    });

    return {
      message: this.t('auth.success.loggedIn'),
      data: {
        token,
        user_id: user.id,
        username: user.username,
        user_img: user.userImg,
      },
    };
  }

  // ============================================================================
  // CAPTCHA
  // ============================================================================

  async createCaptcha(): Promise<ServiceResult<CaptchaChallenge>> {
    const challenge = await this.captchaService.generate();
    return { message: this.t('auth.success.captchaCreated'), data: challenge };
  }

  // ============================================================================
  // PASSWORD RESET
  // ============================================================================

  /**
   * Mails a verification code to the account's address. A code still cached
   * for that address is sent again rather than replaced, so repeated requests
   * inside the TTL window deliver the same code.
   *
   * @throws BadRequestException   No account uses the address.
   * @throws ServerErrorException  SMTP delivery failed.
   */
  async forgetPassword(dto: ForgetPasswordDto): Promise<ServiceResult> {
    const user = await this.users.findOne({ where: { email: dto.email } });
    if (!user) {
      throw new BadRequestException(this.t('auth.errors.emailNotFound'));
    }

    const ttlSeconds = this.config.get<number>('verification.ttlSeconds', 900);
    const key = CACHE_KEYS.VERIFY_CODE(dto.email);

    let code = await this.cache.get<string>(key);
    if (!code) {
      code = createRandomCode(AUTH_CONSTANTS.VERIFY_CODE_LENGTH);
      await this.cache.set(key, code, ttlSeconds);
    }

    try {
      await this.mailService.sendForgetPasswordEmail(
        user.email,
        user.username,
        code,
        ttlSeconds,
      );
    } catch (error) {
      throw new ServerErrorException(
        this.t('auth.errors.mailDeliveryFailed'),
        error,
      );
    }

    return { message: this.t('auth.success.codeSent') };
  }

  /**
   * Replaces the password of the account behind `email` once the emailed
   * code matches. The code stays cached until it expires unless
   * `verification.consumeOnReset` is on.
   *
   * @throws BadRequestException   Missing/mismatched code or unknown address.
   */
  async resetPassword(dto: ResetPasswordDto): Promise<ServiceResult> {
    const key = CACHE_KEYS.VERIFY_CODE(dto.email);
    const cached = await this.cache.get<string>(key);
    if (!cached || cached !== dto.verify_code) {
      throw new BadRequestException(this.t('auth.errors.invalidVerifyCode'));
    }

    const user = await this.users.findOne({
      where: { email: dto.email },
      select: { id: true, username: true },
    });
    if (!user) {
      throw new BadRequestException(this.t('auth.errors.emailNotFound'));
    }

    await this.users.update({ id: user.id }, { pwd: await hash(dto.pwd) });

    if (this.config.get<boolean>('verification.consumeOnReset', false)) {
      await this.cache.del(key);
    }

    this.logger.log(`Password reset for ${user.username}`);
    return { message: this.t('auth.success.passwordReset') };
  }

  private t(key: string, options?: MessageOptions): string {
    return translate(this.i18n, key, options);
  }
}
