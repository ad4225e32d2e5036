import { Public } from '@/common/decorators/public.decorator';
import { IdsQueryDto } from '@/common/dto/ids.dto';
import { PageResult, ServiceResult } from '@/common/types/api-result.type';
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { CategoryService } from './category.service';
import {
  ArticleCategoryDto,
  ArticleCategoryEditDto,
  CategoryAllQueryDto,
  CategoryPageDto,
  LinkCategoryDto,
  LinkCategoryEditDto,
} from './dto/category.dto';
import { Category } from './entities/category.entity';

/**
 *  ├─ GET    /categories              (public)
 *  ├─ GET    /categories/all?type=    (public)
 *  ├─ GET    /categories/:id          (public)
 *  ├─ POST   /categories/article
 *  ├─ PUT    /categories/article
 *  ├─ POST   /categories/link
 *  ├─ PUT    /categories/link
 *  ├─ DELETE /categories/:id
 *  └─ DELETE /categories?ids=1,2,3
 */
@Controller('categories')
export class CategoryController {
  constructor(private readonly categoryService: CategoryService) {}

  @Public()
  @Get()
  findPage(
    @Query() query: CategoryPageDto,
  ): Promise<ServiceResult<PageResult<Category>>> {
    return this.categoryService.findPage(query);
  }

  @Public()
  @Get('all')
  findAll(
    @Query() query: CategoryAllQueryDto,
  ): Promise<ServiceResult<Category[]>> {
    return this.categoryService.findAll(query.type);
  }

  @Public()
  @Get(':id')
  findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<ServiceResult<Category>> {
    return this.categoryService.findOne(id);
  }

  @Post('article')
  @HttpCode(HttpStatus.OK)
  createArticle(
    @Body() dto: ArticleCategoryDto,
  ): Promise<ServiceResult<Category>> {
    return this.categoryService.createArticleCategory(dto);
  }

  @Put('article')
  updateArticle(
    @Body() dto: ArticleCategoryEditDto,
  ): Promise<ServiceResult<Category>> {
    return this.categoryService.updateArticleCategory(dto);
  }

  @Post('link')
  @HttpCode(HttpStatus.OK)
  createLink(@Body() dto: LinkCategoryDto): Promise<ServiceResult<Category>> {
    return this.categoryService.createLinkCategory(dto);
  }

  @Put('link')
  updateLink(
    @Body() dto: LinkCategoryEditDto,
  ): Promise<ServiceResult<Category>> {
    return this.categoryService.updateLinkCategory(dto);
  }

  @Delete()
  removeMany(@Query() query: IdsQueryDto): Promise<ServiceResult> {
    return this.categoryService.removeMany(query.ids);
  }

  @Delete(':id')
  remove(@Param('id', ParseIntPipe) id: number): Promise<ServiceResult> {
    return this.categoryService.remove(id);
  }
}
