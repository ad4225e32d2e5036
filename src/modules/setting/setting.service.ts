import { SETTING_GROUPS } from '@/common/constants/auth.constants';
import { translate } from '@/common/i18n/translate';
import { ServiceResult } from '@/common/types/api-result.type';
import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { I18nService } from 'nestjs-i18n';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { SiteSettingDto, SmtpSettingDto } from './dto/setting.dto';
import { SysSettingItem } from './entities/sys-setting-item.entity';
import { SysSetting } from './entities/sys-setting.entity';

export type SettingItems = Record<string, string>;

/** Keys that are written but never read back over the API. */
const SECRET_KEYS = ['pwd'];

@Injectable()
export class SettingService {
  private readonly logger = new Logger(SettingService.name);

  constructor(
    private readonly i18n: I18nService,
    private readonly dataSource: DataSource,
    @InjectRepository(SysSetting)
    private readonly settings: Repository<SysSetting>,
    @InjectRepository(SysSettingItem)
    private readonly items: Repository<SysSettingItem>,
  ) {}

  /**
   * All key/value pairs of a group, or `{}` when the group does not exist.
   */
  async getItems(name: string): Promise<SettingItems> {
    const group = await this.settings.findOne({ where: { name } });
    if (!group) return {};

    const rows = await this.items.find({
      where: { sysId: group.id },
      order: { id: 'ASC' },
    });

    return Object.fromEntries(rows.map((row) => [row.key, row.val]));
  }

  async findItems(name: string): Promise<ServiceResult<SettingItems>> {
    const items = await this.getItems(name);
    const visible = Object.fromEntries(
      Object.entries(items).filter(([key]) => !SECRET_KEYS.includes(key)),
    );

    return {
      message: translate(this.i18n, 'setting.success.found'),
      data: visible,
    };
  }

  /**
   * Creates the group when missing and upserts its items keyed by
   * (group id, key). Runs in its own transaction unless a manager is passed,
   * in which case it joins the caller's.
   */
  async saveGroup(
    name: string,
    items: SettingItems,
    manager?: EntityManager,
  ): Promise<SysSetting> {
    if (!manager) {
      return this.dataSource.transaction((tx) =>
        this.saveGroup(name, items, tx),
      );
    }

    const groups = manager.getRepository(SysSetting);
    const group =
      (await groups.findOne({ where: { name } })) ??
      (await groups.save(groups.create({ name })));

    const rows = Object.entries(items).map(([key, val]) => ({
      sysId: group.id,
      key,
      val,
    }));

    if (rows.length > 0) {
      await manager
        .getRepository(SysSettingItem)
        .upsert(rows, ['sysId', 'key']);
    }

    this.logger.debug(`Saved ${rows.length} item(s) in settings "${name}"`);
    return group;
  }

  async saveSite(dto: SiteSettingDto): Promise<ServiceResult> {
    await this.saveGroup(SETTING_GROUPS.SITE, {
      type_name: dto.type_name,
      site_name: dto.site_name,
      site_desc: dto.site_desc ?? '',
      site_url: dto.site_url,
      site_logo: dto.site_logo ?? '',
      seo_key_words: dto.seo_key_words ?? '',
      head_content: dto.head_content ?? '',
      footer_content: dto.footer_content ?? '',
    });

    return { message: translate(this.i18n, 'setting.success.saved') };
  }

  async saveSmtp(dto: SmtpSettingDto): Promise<ServiceResult> {
    await this.saveGroup(SETTING_GROUPS.SMTP, {
      type_name: dto.type_name,
      address: dto.address,
      port: dto.port,
      account: dto.account,
      pwd: dto.pwd,
      sender: dto.sender,
    });

    return { message: translate(this.i18n, 'setting.success.saved') };
  }
}
