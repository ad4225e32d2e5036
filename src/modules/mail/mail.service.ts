import { SETTING_GROUPS } from '@/common/constants/auth.constants';
import { ServerErrorException } from '@/common/exceptions/server-error.exception';
import { translate } from '@/common/i18n/translate';
import { ServiceResult } from '@/common/types/api-result.type';
import { SettingService } from '@/modules/setting/setting.service';
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { I18nService } from 'nestjs-i18n';
import * as nodemailer from 'nodemailer';
import { Transporter } from 'nodemailer';
import { TestMailDto } from './dto/mail.dto';
import { renderForgetPasswordHtml } from './templates/forget-password.template';

interface ResolvedTransport {
  transporter: Transporter;
  from: string;
  senderName?: string;
}

export interface MailOptions {
  to: string;
  subject: string;
  html: string;
  senderName?: string;
}

@Injectable()
export class MailService implements OnModuleInit {
  private readonly logger = new Logger(MailService.name);
  private fallback: ResolvedTransport | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly i18n: I18nService,
    private readonly settingService: SettingService,
  ) {}

  onModuleInit(): void {
    const host = this.configService.get<string>('mail.host');
    const port = this.configService.get<number>('mail.port');
    const user = this.configService.get<string>('mail.user');
    const password = this.configService.get<string>('mail.password');

    if (!host || !port || !user || !password) {
      this.logger.warn(
        'Mail configuration is incomplete; only the stored SMTP settings will be used.',
      );
      return;
    }

    this.fallback = {
      transporter: nodemailer.createTransport({
        host,
        port,
        secure: port === 465,
        auth: { user, pass: password },
      }),
      from: this.configService.get<string>('mail.from') || user,
    };

    this.logger.log('Mail fallback transport initialized');
  }

  /**
   * The stored SMTP settings group wins when complete; the `mail.*`
   * configuration is the fallback.
   */
  private async resolveTransport(): Promise<ResolvedTransport> {
    const smtp = await this.settingService.getItems(SETTING_GROUPS.SMTP);

    if (smtp.address && smtp.port && smtp.account && smtp.pwd) {
      const port = parseInt(smtp.port, 10);
      return {
        transporter: nodemailer.createTransport({
          host: smtp.address,
          port,
          secure: port === 465,
          auth: { user: smtp.account, pass: smtp.pwd },
        }),
        from: smtp.account,
        senderName: smtp.sender || smtp.account,
      };
    }

    if (this.fallback) return this.fallback;

    throw new Error('SMTP transport is not configured');
  }

  async sendMail(options: MailOptions): Promise<void> {
    const { transporter, from, senderName } = await this.resolveTransport();
    const name = options.senderName ?? senderName;

    try {
      await transporter.sendMail({
        from: name ? { name, address: from } : from,
        to: options.to,
        subject: options.subject,
        html: options.html,
      });
      this.logger.log(`Email sent to ${options.to}`);
    } catch (error) {
      this.logger.error(`Failed to send email to ${options.to}:`, error);
      throw error;
    }
  }

  async sendForgetPasswordEmail(
    email: string,
    username: string,
    code: string,
    ttlSeconds: number,
  ): Promise<void> {
    const minutes = Math.ceil(ttlSeconds / 60);

    await this.sendMail({
      to: email,
      subject: translate(this.i18n, 'mail.forgetPassword.subject'),
      html: renderForgetPasswordHtml({
        greeting: translate(this.i18n, 'mail.forgetPassword.greeting', {
          args: { username },
        }),
        intro: translate(this.i18n, 'mail.forgetPassword.intro'),
        code,
        expiry: translate(this.i18n, 'mail.forgetPassword.expiry', {
          args: { minutes },
        }),
        ignore: translate(this.i18n, 'mail.forgetPassword.ignore'),
      }),
    });
  }

  async sendTestMail(dto: TestMailDto): Promise<ServiceResult> {
    try {
      await this.sendMail({
        to: dto.receive_email,
        subject: dto.title,
        html: dto.content,
        senderName: dto.sender,
      });
    } catch (error) {
      throw new ServerErrorException(
        translate(this.i18n, 'mail.errors.deliveryFailed'),
        error,
      );
    }

    return { message: translate(this.i18n, 'mail.success.sent') };
  }
}
