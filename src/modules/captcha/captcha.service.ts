import { AppCacheService } from '@/cache/cache.service';
import { CACHE_KEYS } from '@/common/constants/auth.constants';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import * as svgCaptcha from 'svg-captcha';

export interface CaptchaChallenge {
  captcha_id: string;
  /** `data:image/svg+xml;base64,…`, usable directly as an <img> src. */
  captcha_url: string;
}

@Injectable()
export class CaptchaService {
  private readonly logger = new Logger(CaptchaService.name);

  constructor(
    private readonly config: ConfigService,
    private readonly cache: AppCacheService,
  ) {}

  async generate(): Promise<CaptchaChallenge> {
    const captcha = svgCaptcha.create({
      size: this.config.get<number>('captcha.length', 4),
      noise: this.config.get<number>('captcha.noise', 2),
      ignoreChars: '0oO1ilI',
      color: true,
    });

    const id = randomUUID();
    await this.cache.set(
      CACHE_KEYS.CAPTCHA(id),
      captcha.text,
      this.config.get<number>('captcha.ttl', 300),
    );

    return {
      captcha_id: id,
      captcha_url: `data:image/svg+xml;base64,${Buffer.from(captcha.data).toString('base64')}`,
    };
  }

  /**
   * Checks an answer against the challenge and consumes the challenge,
   * whatever the outcome.
   */
  async verify(id: string, answer: string): Promise<boolean> {
    if (!id) return false;

    const expected = await this.cache.take<string>(CACHE_KEYS.CAPTCHA(id));
    if (!expected || !answer) {
      this.logger.debug(`Captcha ${id} missing, expired or unanswered`);
      return false;
    }

    if (this.config.get<boolean>('captcha.caseSensitive', false)) {
      return expected === answer;
    }
    return expected.toLowerCase() === answer.toLowerCase();
  }
}
