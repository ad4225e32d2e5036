import { AppCacheService } from '@/cache/cache.service';
import { ServerErrorException } from '@/common/exceptions/server-error.exception';
import { CaptchaService } from '@/modules/captcha/captcha.service';
import { MailService } from '@/modules/mail/mail.service';
import { SettingService } from '@/modules/setting/setting.service';
import { User } from '@/modules/user/entities/user.entity';
import { FakeCache } from '@test/utils/fake-cache';
import { createI18nMock } from '@test/utils/i18n.mock';
import {
  BadRequestException,
  ConflictException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { hash, verify } from 'argon2';
import { I18nService } from 'nestjs-i18n';
import { DataSource, QueryFailedError } from 'typeorm';
import { AuthService } from './auth.service';

const registeredUser = (overrides: Partial<User> = {}): User => ({
  id: 1,
  username: 'alice',
  pwd: '',
  email: 'alice@example.com',
  userImg: '',
  createdAt: new Date(0),
  updatedAt: new Date(0),
  ...overrides,
});

describe('AuthService', () => {
  let service: AuthService;
  let cache: FakeCache;

  const users = {
    findOne: jest.fn(),
    update: jest.fn(),
  };
  const txUsers = {
    create: jest.fn((value: Partial<User>) => value),
    save: jest.fn(async (value: Partial<User>) => ({ id: 1, ...value })),
  };
  const manager = { getRepository: jest.fn(() => txUsers) };
  const dataSource = {
    transaction: jest.fn(
      async (work: (tx: typeof manager) => Promise<unknown>) => work(manager),
    ),
  };
  const jwtService = { signAsync: jest.fn() };
  const mailService = { sendForgetPasswordEmail: jest.fn() };
  const captchaService = { generate: jest.fn(), verify: jest.fn() };
  const settingService = { saveGroup: jest.fn() };

  const compile = async (consumeOnReset = false): Promise<void> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        { provide: I18nService, useValue: createI18nMock() },
        { provide: getRepositoryToken(User), useValue: users },
        { provide: DataSource, useValue: dataSource },
        { provide: JwtService, useValue: jwtService },
        {
          provide: ConfigService,
          useValue: new ConfigService({
            jwt: { secret: 'test-secret', expiresIn: 86400 },
            verification: { ttlSeconds: 900, consumeOnReset },
          }),
        },
        { provide: MailService, useValue: mailService },
        { provide: AppCacheService, useValue: cache },
        { provide: CaptchaService, useValue: captchaService },
        { provide: SettingService, useValue: settingService },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    users.findOne.mockReset();
    mailService.sendForgetPasswordEmail.mockResolvedValue(undefined);
    cache = new FakeCache();
    await compile();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('register', () => {
    const dto = {
      username: 'alice',
      pwd: 'secret-pass',
      email: 'alice@example.com',
      site_name: 'My Blog',
      site_url: 'https://blog.example.com',
    };

    it('rejects a taken username without opening a transaction', async () => {
      users.findOne.mockResolvedValue({ id: 1 });

      await expect(service.register(dto)).rejects.toThrow(
        new ConflictException('该用户已被注册'),
      );
      expect(dataSource.transaction).not.toHaveBeenCalled();
    });

    it('stores a hashed password and the site group in one transaction', async () => {
      users.findOne.mockResolvedValue(null);

      const result = await service.register(dto);

      expect(result).toEqual({ message: '注册成功' });
      expect(dataSource.transaction).toHaveBeenCalledTimes(1);

      const saved = txUsers.save.mock.calls[0][0];
      expect(saved.username).toBe('alice');
      expect(saved.email).toBe('alice@example.com');
      expect(saved.pwd).not.toBe('secret-pass');
      expect(await verify(String(saved.pwd), 'secret-pass')).toBe(true);

      expect(settingService.saveGroup).toHaveBeenCalledWith(
        '网站设置',
        {
          type_name: '网站设置',
          site_name: 'My Blog',
          site_url: 'https://blog.example.com',
        },
        manager,
      );
    });

    it('reports a username taken by a concurrent registration as a conflict', async () => {
      users.findOne.mockResolvedValue(null);
      txUsers.save.mockRejectedValueOnce(
        new QueryFailedError(
          'INSERT INTO `users`',
          [],
          Object.assign(new Error("Duplicate entry 'alice'"), {
            code: 'ER_DUP_ENTRY',
          }),
        ),
      );

      await expect(service.register(dto)).rejects.toThrow(
        new ConflictException('该用户已被注册'),
      );
      expect(settingService.saveGroup).not.toHaveBeenCalled();
    });

    it('surfaces a failure inside the transaction', async () => {
      users.findOne.mockResolvedValue(null);
      settingService.saveGroup.mockRejectedValueOnce(new Error('deadlock'));

      await expect(service.register(dto)).rejects.toThrow('deadlock');
    });
  });

  describe('login', () => {
    const dto = {
      username: 'alice',
      pwd: 'right-password',
      captcha_id: 'c-1',
      captcha_val: 'x7Kp',
    };

    it('rejects a wrong captcha before looking up the user', async () => {
      captchaService.verify.mockResolvedValue(false);

      await expect(service.login(dto)).rejects.toThrow(
        new BadRequestException('验证码错误'),
      );
      expect(captchaService.verify).toHaveBeenCalledWith('c-1', 'x7Kp');
      expect(users.findOne).not.toHaveBeenCalled();
    });

    it('rejects an unknown username', async () => {
      captchaService.verify.mockResolvedValue(true);
      users.findOne.mockResolvedValue(null);

      await expect(service.login(dto)).rejects.toThrow(
        new BadRequestException('不存在该用户'),
      );
    });

    it('rejects a wrong password', async () => {
      captchaService.verify.mockResolvedValue(true);
      users.findOne.mockResolvedValue(
        registeredUser({ pwd: await hash('right-password') }),
      );

      await expect(
        service.login({ ...dto, pwd: 'wrong-password' }),
      ).rejects.toThrow(new BadRequestException('密码错误'));
      expect(jwtService.signAsync).not.toHaveBeenCalled();
    });

    it('issues a token for valid credentials', async () => {
      captchaService.verify.mockResolvedValue(true);
      users.findOne.mockResolvedValue(
        registeredUser({ pwd: await hash('right-password') }),
      );
      jwtService.signAsync.mockResolvedValue('signed-token');

      const result = await service.login(dto);

      expect(jwtService.signAsync).toHaveBeenCalledWith(
        { username: 'alice', userImg: '' },
        { expiresIn: 86400 },
      );
      expect(result).toEqual({
        message: '登录成功',
        data: {
          token: 'signed-token',
          user_id: 1,
          username: 'alice',
          user_img: '',
        },
      });
    });
  });

  describe('createCaptcha', () => {
    it('wraps the generated challenge', async () => {
      const challenge = {
        captcha_id: 'c-1',
        captcha_url: 'data:image/svg+xml;base64,AAAA',
      };
      captchaService.generate.mockResolvedValue(challenge);

      await expect(service.createCaptcha()).resolves.toEqual({
        message: '验证码创建成功',
        data: challenge,
      });
    });
  });

  describe('forgetPassword', () => {
    const sentCodes = (): string[] =>
      mailService.sendForgetPasswordEmail.mock.calls.map((call) =>
        String(call[2]),
      );

    it('rejects an unregistered address without sending mail', async () => {
      users.findOne.mockResolvedValue(null);

      await expect(
        service.forgetPassword({ email: 'nobody@example.com' }),
      ).rejects.toThrow(new BadRequestException('不存在该邮箱帐号'));
      expect(mailService.sendForgetPasswordEmail).not.toHaveBeenCalled();
      expect(cache.has('verify-code:nobody@example.com')).toBe(false);
    });

    it('mails a six-character code valid for fifteen minutes', async () => {
      users.findOne.mockResolvedValue(registeredUser());

      const result = await service.forgetPassword({
        email: 'alice@example.com',
      });

      expect(result).toEqual({ message: '验证码发送成功，请前往邮箱查看' });
      const [code] = sentCodes();
      expect(code).toMatch(/^[A-Za-z0-9]{6}$/);
      expect(mailService.sendForgetPasswordEmail).toHaveBeenCalledWith(
        'alice@example.com',
        'alice',
        code,
        900,
      );
      expect(await cache.ttl('verify-code:alice@example.com')).toBe(900);
    });

    it('resends the same code inside the window and a new one after it', async () => {
      jest.useFakeTimers();
      users.findOne.mockResolvedValue(registeredUser());

      await service.forgetPassword({ email: 'alice@example.com' });
      jest.advanceTimersByTime(14 * 60 * 1000);
      await service.forgetPassword({ email: 'alice@example.com' });
      jest.advanceTimersByTime(60 * 1000);
      await service.forgetPassword({ email: 'alice@example.com' });

      const [first, second, third] = sentCodes();
      expect(second).toBe(first);
      expect(third).not.toBe(first);
    });

    it('reports a delivery failure as a server error', async () => {
      users.findOne.mockResolvedValue(registeredUser());
      mailService.sendForgetPasswordEmail.mockRejectedValue(
        new Error('connect ECONNREFUSED'),
      );

      await expect(
        service.forgetPassword({ email: 'alice@example.com' }),
      ).rejects.toThrow(
        new ServerErrorException('验证码发送失败，请检查 smtp 配置'),
      );
    });
  });

  describe('resetPassword', () => {
    const dto = {
      email: 'alice@example.com',
      verify_code: 'Ab12Cd',
      pwd: 'new-password',
    };

    it('rejects a mismatched code and leaves the password alone', async () => {
      await cache.set('verify-code:alice@example.com', 'Zz99Zz', 900);

      await expect(service.resetPassword(dto)).rejects.toThrow(
        new BadRequestException('验证码无效或错误'),
      );
      expect(users.update).not.toHaveBeenCalled();
    });

    it('rejects when no code was issued', async () => {
      await expect(service.resetPassword(dto)).rejects.toThrow(
        new BadRequestException('验证码无效或错误'),
      );
    });

    it('stores a new hash and keeps the code until it expires', async () => {
      await cache.set('verify-code:alice@example.com', 'Ab12Cd', 900);
      users.findOne.mockResolvedValue({ id: 1, username: 'alice' });

      await expect(service.resetPassword(dto)).resolves.toEqual({
        message: '重置密码成功',
      });

      const [criteria, patch] = users.update.mock.calls[0];
      expect(criteria).toEqual({ id: 1 });
      expect(await verify(String(patch.pwd), 'new-password')).toBe(true);
      expect(await cache.get('verify-code:alice@example.com')).toBe('Ab12Cd');
    });

    it('consumes the code when configured to', async () => {
      await compile(true);
      await cache.set('verify-code:alice@example.com', 'Ab12Cd', 900);
      users.findOne.mockResolvedValue({ id: 1, username: 'alice' });

      await service.resetPassword(dto);

      expect(cache.has('verify-code:alice@example.com')).toBe(false);
      await expect(service.resetPassword(dto)).rejects.toThrow(
        new BadRequestException('验证码无效或错误'),
      );
    });
  });
});
