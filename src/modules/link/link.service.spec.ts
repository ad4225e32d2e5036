import { CategoryService } from '@/modules/category/category.service';
import {
  Category,
  CategoryType,
} from '@/modules/category/entities/category.entity';
import { createI18nMock } from '@test/utils/i18n.mock';
import {
  createQueryBuilderMock,
  QueryBuilderMock,
} from '@test/utils/query-builder.mock';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { I18nService } from 'nestjs-i18n';
import { LinkPageDto } from './dto/link.dto';
import { Link } from './entities/link.entity';
import { LinkService } from './link.service';

const linkCategory: Category = {
  id: 9,
  type: CategoryType.LINK,
  name: 'Friends',
  url: null,
  parentId: null,
  createdAt: new Date(0),
  updatedAt: new Date(0),
  deletedAt: null,
};

const link = (overrides: Partial<Link> = {}): Link => ({
  id: 1,
  categoryId: 9,
  category: linkCategory,
  name: 'Example',
  url: 'https://example.com',
  desc: '',
  icon: 'https://example.com/icon.png',
  createdAt: new Date(0),
  updatedAt: new Date(0),
  deletedAt: null,
  ...overrides,
});

describe('LinkService', () => {
  let service: LinkService;
  let qb: QueryBuilderMock;
  const repo = {
    createQueryBuilder: jest.fn(),
    findOne: jest.fn(),
    create: jest.fn((value: Partial<Link>) => value),
    save: jest.fn(async (value: Partial<Link>) => ({ id: 3, ...value })),
    softDelete: jest.fn(),
  };
  const categoryService = { findLiveOfType: jest.fn() };

  beforeEach(async () => {
    jest.clearAllMocks();
    qb = createQueryBuilderMock([link()], 4);
    repo.createQueryBuilder.mockReturnValue(qb);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LinkService,
        { provide: I18nService, useValue: createI18nMock() },
        { provide: getRepositoryToken(Link), useValue: repo },
        { provide: CategoryService, useValue: categoryService },
      ],
    }).compile();

    service = module.get<LinkService>(LinkService);
  });

  describe('findPage', () => {
    it('joins categories including soft-deleted ones but hides deleted links', async () => {
      const query = Object.assign(new LinkPageDto(), {
        key: 'exa',
        category_id: 9,
        page: 1,
        size: 10,
      });

      const result = await service.findPage(query);

      expect(repo.createQueryBuilder).toHaveBeenCalledWith('link');
      expect(qb.leftJoinAndSelect).toHaveBeenCalledWith(
        'link.category',
        'category',
      );
      expect(qb.withDeleted).toHaveBeenCalled();
      expect(qb.where).toHaveBeenCalledWith('link.deletedAt IS NULL');
      expect(qb.andWhere).toHaveBeenCalledWith('link.name LIKE :key', {
        key: '%exa%',
      });
      expect(qb.andWhere).toHaveBeenCalledWith('link.categoryId = :categoryId', {
        categoryId: 9,
      });
      expect(qb.skip).toHaveBeenCalledWith(0);
      expect(qb.take).toHaveBeenCalledWith(10);
      expect(result).toEqual({
        message: '获取友链成功',
        data: { list: [link()], total: 4, page: 1, size: 10 },
      });
    });

    it('skips filters that were not given', async () => {
      await service.findPage(new LinkPageDto());

      expect(qb.andWhere).not.toHaveBeenCalled();
    });

    it('matches % and _ in the search key literally', async () => {
      const query = Object.assign(new LinkPageDto(), { key: '100%_ok' });

      await service.findPage(query);

      expect(qb.andWhere).toHaveBeenCalledWith('link.name LIKE :key', {
        key: '%100\\%\\_ok%',
      });
    });
  });

  describe('findOne', () => {
    it('rejects a missing link', async () => {
      qb.getOne.mockResolvedValue(null);

      await expect(service.findOne(5)).rejects.toThrow(
        new NotFoundException('友链不存在'),
      );
      expect(qb.andWhere).toHaveBeenCalledWith('link.id = :id', { id: 5 });
    });
  });

  describe('create', () => {
    it('requires the category to be a link category', async () => {
      categoryService.findLiveOfType.mockResolvedValue(null);

      await expect(
        service.create({
          category_id: 2,
          name: 'Example',
          url: 'https://example.com',
          icon: 'https://example.com/icon.png',
        }),
      ).rejects.toThrow(new BadRequestException('友链分类不存在'));
      expect(categoryService.findLiveOfType).toHaveBeenCalledWith(
        2,
        CategoryType.LINK,
      );
      expect(repo.save).not.toHaveBeenCalled();
    });

    it('stores an uncategorised link with an empty description', async () => {
      const result = await service.create({
        name: 'Example',
        url: 'https://example.com',
        icon: 'https://example.com/icon.png',
      });

      expect(result).toEqual({
        message: '添加友链成功',
        data: {
          id: 3,
          categoryId: null,
          name: 'Example',
          url: 'https://example.com',
          desc: '',
          icon: 'https://example.com/icon.png',
        },
      });
    });
  });

  describe('update', () => {
    it('rejects an unknown id', async () => {
      repo.findOne.mockResolvedValue(null);

      await expect(
        service.update({
          ID: 8,
          name: 'Example',
          url: 'https://example.com',
          icon: 'i',
        }),
      ).rejects.toThrow(new NotFoundException('友链不存在'));
    });

    it('moves the link to another link category', async () => {
      const current = link();
      repo.findOne.mockResolvedValue(current);
      categoryService.findLiveOfType.mockResolvedValue({
        ...linkCategory,
        id: 11,
      });

      const result = await service.update({
        ID: 1,
        category_id: 11,
        name: 'Renamed',
        url: 'https://example.org',
        desc: 'about',
        icon: 'i',
      });

      expect(repo.save).toHaveBeenCalledWith({
        ...current,
        categoryId: 11,
        name: 'Renamed',
        url: 'https://example.org',
        desc: 'about',
        icon: 'i',
      });
      expect(result.message).toBe('修改友链成功');
    });
  });

  describe('remove', () => {
    it('rejects an id that matched nothing', async () => {
      repo.softDelete.mockResolvedValue({ affected: 0, raw: [], generatedMaps: [] });

      await expect(service.remove(4)).rejects.toThrow(
        new NotFoundException('友链不存在'),
      );
    });
  });
});
