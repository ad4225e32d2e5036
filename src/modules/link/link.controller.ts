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
import { LinkDto, LinkEditDto, LinkPageDto } from './dto/link.dto';
import { Link } from './entities/link.entity';
import { LinkService } from './link.service';

/**
 * Friend links.
 *
 *  ├─ GET    /links          (public)
 *  ├─ GET    /links/all      (public)
 *  ├─ GET    /links/:id      (public)
 *  ├─ POST   /links
 *  ├─ PUT    /links
 *  ├─ DELETE /links/:id
 *  └─ DELETE /links?ids=1,2
 */
@Controller('links')
export class LinkController {
  constructor(private readonly linkService: LinkService) {}

  @Public()
  @Get()
  findPage(
    @Query() query: LinkPageDto,
  ): Promise<ServiceResult<PageResult<Link>>> {
    return this.linkService.findPage(query);
  }

  @Public()
  @Get('all')
  findAll(): Promise<ServiceResult<Link[]>> {
    return this.linkService.findAll();
  }

  @Public()
  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): Promise<ServiceResult<Link>> {
    return this.linkService.findOne(id);
  }

  @Post()
  @HttpCode(HttpStatus.OK)
  create(@Body() dto: LinkDto): Promise<ServiceResult<Link>> {
    return this.linkService.create(dto);
  }

  @Put()
  update(@Body() dto: LinkEditDto): Promise<ServiceResult<Link>> {
    return this.linkService.update(dto);
  }

  @Delete()
  removeMany(@Query() query: IdsQueryDto): Promise<ServiceResult> {
    return this.linkService.removeMany(query.ids);
  }

  @Delete(':id')
  remove(@Param('id', ParseIntPipe) id: number): Promise<ServiceResult> {
    return this.linkService.remove(id);
  }
}
