import { translate } from '@/common/i18n/translate';
import { PageResult, ServiceResult } from '@/common/types/api-result.type';
import { escapeLike } from '@/common/utils/escape-like';
import { CategoryService } from '@/modules/category/category.service';
import { CategoryType } from '@/modules/category/entities/category.entity';
import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { I18nService } from 'nestjs-i18n';
import { In, Repository, SelectQueryBuilder } from 'typeorm';
import { LinkDto, LinkEditDto, LinkPageDto } from './dto/link.dto';
import { Link } from './entities/link.entity';

@Injectable()
export class LinkService {
  private readonly logger = new Logger(LinkService.name);

  constructor(
    private readonly i18n: I18nService,
    @InjectRepository(Link)
    private readonly links: Repository<Link>,
    private readonly categoryService: CategoryService,
  ) {}

  async findPage(query: LinkPageDto): Promise<ServiceResult<PageResult<Link>>> {
    const qb = this.liveLinks();
    if (query.key) {
      qb.andWhere('link.name LIKE :key', {
        key: `%${escapeLike(query.key)}%`,
      });
    }
    if (query.category_id) {
      qb.andWhere('link.categoryId = :categoryId', {
        categoryId: query.category_id,
      });
    }

    const [list, total] = await qb
      .orderBy('link.id', 'DESC')
      .skip(query.skip)
      .take(query.size)
      .getManyAndCount();

    return {
      message: translate(this.i18n, 'link.success.found'),
      data: { list, total, page: query.page, size: query.size },
    };
  }

  async findAll(): Promise<ServiceResult<Link[]>> {
    const list = await this.liveLinks().orderBy('link.id', 'ASC').getMany();
    return { message: translate(this.i18n, 'link.success.found'), data: list };
  }

  async findOne(id: number): Promise<ServiceResult<Link>> {
    const link = await this.liveLinks()
      .andWhere('link.id = :id', { id })
      .getOne();
    if (!link) {
      throw new NotFoundException(translate(this.i18n, 'link.errors.notFound'));
    }

    return { message: translate(this.i18n, 'link.success.found'), data: link };
  }

  async create(dto: LinkDto): Promise<ServiceResult<Link>> {
    const categoryId = await this.resolveCategory(dto.category_id);
    const saved = await this.links.save(
      this.links.create({
        categoryId,
        name: dto.name,
        url: dto.url,
        desc: dto.desc ?? '',
        icon: dto.icon,
      }),
    );

    return {
      message: translate(this.i18n, 'link.success.created'),
      data: saved,
    };
  }

  async update(dto: LinkEditDto): Promise<ServiceResult<Link>> {
    const link = await this.links.findOne({ where: { id: dto.ID } });
    if (!link) {
      throw new NotFoundException(translate(this.i18n, 'link.errors.notFound'));
    }

    const categoryId = await this.resolveCategory(dto.category_id);
    const saved = await this.links.save({
      ...link,
      categoryId,
      name: dto.name,
      url: dto.url,
      desc: dto.desc ?? '',
      icon: dto.icon,
    });

    return {
      message: translate(this.i18n, 'link.success.updated'),
      data: saved,
    };
  }

  async remove(id: number): Promise<ServiceResult> {
    const result = await this.links.softDelete({ id });
    if (!result.affected) {
      throw new NotFoundException(translate(this.i18n, 'link.errors.notFound'));
    }

    this.logger.log(`Link ${id} soft-deleted`);
    return { message: translate(this.i18n, 'link.success.deleted') };
  }

  async removeMany(ids: number[]): Promise<ServiceResult> {
    const result = await this.links.softDelete({ id: In(ids) });

    this.logger.log(`${result.affected ?? 0} link(s) soft-deleted`);
    return { message: translate(this.i18n, 'link.success.deleted') };
  }

  /**
   * Live links joined with their category. The category join ignores
   * soft deletion so a link keeps showing the category it was filed under.
   */
  private liveLinks(): SelectQueryBuilder<Link> {
    return this.links
      .createQueryBuilder('link')
      .leftJoinAndSelect('link.category', 'category')
      .withDeleted()
      .where('link.deletedAt IS NULL');
  }

  private async resolveCategory(
    categoryId: number | undefined,
  ): Promise<number | null> {
    if (!categoryId) return null;

    const category = await this.categoryService.findLiveOfType(
      categoryId,
      CategoryType.LINK,
    );
    if (!category) {
      throw new BadRequestException(
        translate(this.i18n, 'link.errors.categoryNotFound'),
      );
    }
    return category.id;
  }
}
