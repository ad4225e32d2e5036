import { Module } from '@nestjs/common';
import { SettingModule } from '../setting/setting.module';
import { MailController } from './mail.controller';
import { MailService } from './mail.service';

@Module({
  imports: [SettingModule],
  controllers: [MailController],
  providers: [MailService],
  exports: [MailService],
})
export class MailModule {}
