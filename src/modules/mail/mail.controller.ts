import { ServiceResult } from '@/common/types/api-result.type';
import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { TestMailDto } from './dto/mail.dto';
import { MailService } from './mail.service';

@Controller('sys_setting/email')
export class MailController {
  constructor(private readonly mailService: MailService) {}

  /**
   * POST /sys_setting/email/test
   *
   * Sends a mail through the currently effective SMTP transport so an admin
   * can check the stored settings.
   */
  @Post('test')
  @HttpCode(HttpStatus.OK)
  sendTest(@Body() dto: TestMailDto): Promise<ServiceResult> {
    return this.mailService.sendTestMail(dto);
  }
}
