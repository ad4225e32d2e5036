import { ServerErrorException } from '@/common/exceptions/server-error.exception';
import { SettingItemsQueryDto } from '@/modules/setting/dto/setting.dto';
import { createI18nMock } from '@test/utils/i18n.mock';
import {
  BadRequestException,
  ForbiddenException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Test, TestingModule } from '@nestjs/testing';
import { validate, ValidationError } from 'class-validator';
import { I18nService, I18nValidationException } from 'nestjs-i18n';
import { ResultCode } from '../types/api-result.type';
import { ApiExceptionFilter } from './api-exception.filter';

describe('ApiExceptionFilter', () => {
  let filter: ApiExceptionFilter;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ApiExceptionFilter,
        { provide: I18nService, useValue: createI18nMock() },
      ],
    }).compile();

    filter = module.get<ApiExceptionFilter>(ApiExceptionFilter);
  });

  it('reports the first translated validation message as a request error', async () => {
    const errors = await validate(
      Object.assign(new SettingItemsQueryDto(), { name: '' }),
    );

    expect(
      filter.toResult(new I18nValidationException(errors), 'zh', 'GET /'),
    ).toEqual({
      code: ResultCode.REQUEST_ERROR,
      msg: 'name为必填字段',
      data: null,
    });
  });

  it('translates a bare constraint key with the failing property', () => {
    const error = Object.assign(new ValidationError(), {
      property: 'email',
      value: 'not-an-email',
      constraints: { isEmail: 'validation.EMAIL' },
    });

    expect(
      filter.toResult(new I18nValidationException([error]), 'zh', 'POST /'),
    ).toEqual({
      code: ResultCode.REQUEST_ERROR,
      msg: 'email必须是有效的邮箱地址',
      data: null,
    });
  });

  it('fills constraint arguments into the message', () => {
    const error = Object.assign(new ValidationError(), {
      property: 'pwd',
      value: 'abc',
      constraints: {
        isLength: 'validation.LENGTH|{"value":"abc","constraints":[6,128]}',
      },
    });

    expect(
      filter.toResult(new I18nValidationException([error]), 'en', 'POST /'),
    ).toEqual({
      code: ResultCode.REQUEST_ERROR,
      msg: 'pwd must be between 6 and 128 characters',
      data: null,
    });
    expect(
      filter.toResult(new I18nValidationException([error]), 'zh', 'POST /'),
    ).toEqual({
      code: ResultCode.REQUEST_ERROR,
      msg: 'pwd长度必须在6到128之间',
      data: null,
    });
  });

  it('reports the first nested message by its field path', () => {
    const child = Object.assign(new ValidationError(), {
      property: 'name',
      constraints: { isNotEmpty: 'validation.NOT_EMPTY' },
    });
    const parent = Object.assign(new ValidationError(), {
      property: 'site',
      children: [child],
    });

    expect(
      filter.toResult(new I18nValidationException([parent]), 'zh', 'POST /'),
    ).toEqual({
      code: ResultCode.REQUEST_ERROR,
      msg: 'name为必填字段',
      data: null,
    });
  });

  it('maps a rejected bearer token to UNAUTHORIZED', () => {
    expect(
      filter.toResult(new UnauthorizedException(), 'zh', 'GET /'),
    ).toEqual({ code: ResultCode.UNAUTHORIZED, msg: '请先登录', data: null });
  });

  it('passes business-rule messages through as request errors', () => {
    expect(
      filter.toResult(new BadRequestException('验证码错误'), 'zh', 'POST /'),
    ).toEqual({ code: ResultCode.REQUEST_ERROR, msg: '验证码错误', data: null });
    expect(
      filter.toResult(new NotFoundException('分类不存在'), 'zh', 'GET /'),
    ).toEqual({ code: ResultCode.REQUEST_ERROR, msg: '分类不存在', data: null });
    expect(
      filter.toResult(new ForbiddenException('nope'), 'zh', 'GET /'),
    ).toEqual({ code: ResultCode.REQUEST_ERROR, msg: 'nope', data: null });
  });

  it('keeps the message of a ServerErrorException', () => {
    const exception = new ServerErrorException(
      '验证码发送失败，请检查 smtp 配置',
      new Error('ECONNREFUSED'),
    );

    expect(filter.toResult(exception, 'zh', 'POST /')).toEqual({
      code: ResultCode.SERVER_ERROR,
      msg: '验证码发送失败，请检查 smtp 配置',
      data: null,
    });
  });

  it('hides unexpected errors behind a generic message', () => {
    expect(
      filter.toResult(new Error('ER_LOCK_DEADLOCK'), 'zh', 'POST /'),
    ).toEqual({ code: ResultCode.SERVER_ERROR, msg: '服务器端错误', data: null });
  });

  it('always answers with HTTP 200', () => {
    const response = { status: jest.fn().mockReturnThis(), json: jest.fn() };
    const request = { method: 'GET', url: '/api/v1/sys_setting/items' };
    const host = new ExecutionContextHost([request, response]);

    filter.catch(new UnauthorizedException(), host);

    expect(response.status).toHaveBeenCalledWith(200);
    expect(response.json).toHaveBeenCalledWith({
      code: ResultCode.UNAUTHORIZED,
      msg: '请先登录',
      data: null,
    });
  });
});
