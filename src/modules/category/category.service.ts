import { translate } from '@/common/i18n/translate';
import { PageResult, ServiceResult } from '@/common/types/api-result.type';
import { escapeLike } from '@/common/utils/escape-like';
import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { I18nService } from 'nestjs-i18n';
import { In, Like, Repository } from 'typeorm';
import {
  ArticleCategoryDto,
  ArticleCategoryEditDto,
  CategoryPageDto,
  LinkCategoryDto,
  LinkCategoryEditDto,
} from './dto/category.dto';
import { Category, CategoryType } from './entities/category.entity';

@Injectable()
export class CategoryService {
  private readonly logger = new Logger(CategoryService.name);

  constructor(
    private readonly i18n: I18nService,
    @InjectRepository(Category)
    private readonly categories: Repository<Category>,
  ) {}

  // ============================================================================
  // READS
  // ============================================================================

  async findPage(
    query: CategoryPageDto,
  ): Promise<ServiceResult<PageResult<Category>>> {
    const [list, total] = await this.categories.findAndCount({
      where: {
        type: query.category_type,
        name: query.key ? Like(`%${escapeLike(query.key)}%`) : undefined,
      },
      order: { id: 'DESC' },
      skip: query.skip,
      take: query.size,
    });

    return {
      message: translate(this.i18n, 'category.success.found'),
      data: { list, total, page: query.page, size: query.size },
    };
  }

  async findAll(type: CategoryType): Promise<ServiceResult<Category[]>> {
    const list = await this.categories.find({
      where: { type },
      order: { id: 'ASC' },
    });

    return {
      message: translate(this.i18n, 'category.success.found'),
      data: list,
    };
  }

  async findOne(id: number): Promise<ServiceResult<Category>> {
    const category = await this.categories.findOne({ where: { id } });
    if (!category) {
      throw new NotFoundException(
        translate(this.i18n, 'category.errors.notFound'),
      );
    }

    return {
      message: translate(this.i18n, 'category.success.found'),
      data: category,
    };
  }

  // ============================================================================
  // WRITES
  // ============================================================================

  async createArticleCategory(
    dto: ArticleCategoryDto,
  ): Promise<ServiceResult<Category>> {
    const parentId = await this.resolveParent(
      CategoryType.ARTICLE,
      dto.parent_id,
    );

    const saved = await this.categories.save(
      this.categories.create({
        type: CategoryType.ARTICLE,
        name: dto.name,
        url: dto.url,
        parentId,
      }),
    );

    return {
      message: translate(this.i18n, 'category.success.created'),
      data: saved,
    };
  }

  async updateArticleCategory(
    dto: ArticleCategoryEditDto,
  ): Promise<ServiceResult<Category>> {
    const category = await this.getOfType(dto.ID, CategoryType.ARTICLE);
    const parentId = await this.resolveParent(
      CategoryType.ARTICLE,
      dto.parent_id,
      category.id,
    );

    const saved = await this.categories.save({
      ...category,
      name: dto.name,
      url: dto.url,
      parentId,
    });

    return {
      message: translate(this.i18n, 'category.success.updated'),
      data: saved,
    };
  }

  async createLinkCategory(
    dto: LinkCategoryDto,
  ): Promise<ServiceResult<Category>> {
    const saved = await this.categories.save(
      this.categories.create({
        type: CategoryType.LINK,
        name: dto.name,
        url: null,
        parentId: null,
      }),
    );

    return {
      message: translate(this.i18n, 'category.success.created'),
      data: saved,
    };
  }

  async updateLinkCategory(
    dto: LinkCategoryEditDto,
  ): Promise<ServiceResult<Category>> {
    const category = await this.getOfType(dto.ID, CategoryType.LINK);
    const saved = await this.categories.save({ ...category, name: dto.name });

    return {
      message: translate(this.i18n, 'category.success.updated'),
      data: saved,
    };
  }

  async remove(id: number): Promise<ServiceResult> {
    const result = await this.categories.softDelete({ id });
    if (!result.affected) {
      throw new NotFoundException(
        translate(this.i18n, 'category.errors.notFound'),
      );
    }

    this.logger.log(`Category ${id} soft-deleted`);
    return { message: translate(this.i18n, 'category.success.deleted') };
  }

  async removeMany(ids: number[]): Promise<ServiceResult> {
    const result = await this.categories.softDelete({ id: In(ids) });

    this.logger.log(`${result.affected ?? 0} categor(ies) soft-deleted`);
    return { message: translate(this.i18n, 'category.success.deleted') };
  }

  /**
   * Looks up a live category of the given type, e.g. to validate a link's
   * category reference.
   */
  async findLiveOfType(
    id: number,
    type: CategoryType,
  ): Promise<Category | null> {
    return this.categories.findOne({ where: { id, type } });
  }

  // ============================================================================
  // PRIVATE
  // ============================================================================

  private async getOfType(id: number, type: CategoryType): Promise<Category> {
    const category = await this.findLiveOfType(id, type);
    if (!category) {
      throw new NotFoundException(
        translate(this.i18n, 'category.errors.notFound'),
      );
    }
    return category;
  }

  /**
   * Validates a requested parent: it must exist, share the child's type and
   * must not be the child itself or one of its descendants.
   * Returns the parent id to store (null for top level).
   */
  private async resolveParent(
    type: CategoryType,
    parentId: number | undefined,
    selfId?: number,
  ): Promise<number | null> {
    if (!parentId) return null;

    if (parentId === selfId) {
      throw new BadRequestException(
        translate(this.i18n, 'category.errors.selfParent'),
      );
    }

    let cursor = await this.findLiveOfType(parentId, type);
    if (!cursor) {
      throw new BadRequestException(
        translate(this.i18n, 'category.errors.parentNotFound'),
      );
    }

    if (selfId !== undefined) {
      const seen = new Set<number>([cursor.id]);
      while (cursor?.parentId && !seen.has(cursor.parentId)) {
        if (cursor.parentId === selfId) {
          throw new BadRequestException(
            translate(this.i18n, 'category.errors.selfParent'),
          );
        }
        seen.add(cursor.parentId);
        cursor = await this.categories.findOne({
          where: { id: cursor.parentId },
          withDeleted: true,
        });
      }
    }

    return parentId;
  }
}
