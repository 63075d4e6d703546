import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiKeyAuth } from '../decorators/api-key-auth.decorator';
import { CurrentApiKey } from '../decorators/current-api-key.decorator';
import { ApiKey, Item } from '../interfaces';
import { ItemService } from '../services/item.service';
import { assertUuid, parsePagination } from '../utils/validation.util';

export interface ItemListResponse {
  items: Item[];
  total: number;
  skip: number;
  limit: number;
}

/**
 * CRUD endpoints for items. Every route requires a valid API key.
 */
@ApiKeyAuth()
@Controller('items')
export class ItemsController {
  constructor(private readonly itemService: ItemService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() body: unknown, @CurrentApiKey() apiKey?: ApiKey): Promise<Item> {
    return this.itemService.create(body, apiKey?.keyPrefix);
  }

  @Get()
  async list(
    @Query('skip') skip?: string,
    @Query('limit') limit?: string,
  ): Promise<ItemListResponse> {
    const page = parsePagination(skip, limit);
    const { items, total } = await this.itemService.list(page.skip, page.limit);
    return { items, total, skip: page.skip, limit: page.limit };
  }

  @Get(':id')
  async findOne(@Param('id') id: string): Promise<Item> {
    assertUuid(id);
    return this.itemService.findById(id);
  }

  @Patch(':id')
  async update(
    @Param('id') id: string,
    @Body() body: unknown,
    @CurrentApiKey() apiKey?: ApiKey,
  ): Promise<Item> {
    assertUuid(id);
    return this.itemService.update(id, body, apiKey?.keyPrefix);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id') id: string, @CurrentApiKey() apiKey?: ApiKey): Promise<void> {
    assertUuid(id);
    await this.itemService.delete(id, apiKey?.keyPrefix);
  }
}
