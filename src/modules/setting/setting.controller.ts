import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { ServiceResult } from '@/common/types/api-result.type';
import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Query,
} from '@nestjs/common';
import {
  SettingItemsQueryDto,
  SiteSettingDto,
  SmtpSettingDto,
} from './dto/setting.dto';
import { SettingItems, SettingService } from './setting.service';

/**
 *  ├─ GET    /sys_setting/items?name=<group>
 *  ├─ POST   /sys_setting/site
 *  └─ POST   /sys_setting/smtp
 *
 * All routes require a bearer token.
 */
@Controller('sys_setting')
export class SettingController {
  private readonly logger = new Logger(SettingController.name);

  constructor(private readonly settingService: SettingService) {}

  @Get('items')
  findItems(
    @Query() query: SettingItemsQueryDto,
  ): Promise<ServiceResult<SettingItems>> {
    return this.settingService.findItems(query.name);
  }

  @Post('site')
  @HttpCode(HttpStatus.OK)
  saveSite(
    @Body() dto: SiteSettingDto,
    @CurrentUser('username') username: string,
  ): Promise<ServiceResult> {
    this.logger.log(`Site settings updated by ${username}`);
    return this.settingService.saveSite(dto);
  }

  @Post('smtp')
  @HttpCode(HttpStatus.OK)
  saveSmtp(
    @Body() dto: SmtpSettingDto,
    @CurrentUser('username') username: string,
  ): Promise<ServiceResult> {
    this.logger.log(`SMTP settings updated by ${username}`);
    return this.settingService.saveSmtp(dto);
  }
}
