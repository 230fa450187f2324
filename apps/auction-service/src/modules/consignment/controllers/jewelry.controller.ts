import { Controller, Get, Param, ParseUUIDPipe, Query } from '@nestjs/common';
import { JewelryService } from '../services/jewelry.service';
import { ListJewelryQueryDto } from '../dto/list-jewelry-query.dto';

/** Public catalogue. */
@Controller('jewelry')
export class JewelryController {
  constructor(private readonly jewelry: JewelryService) {}

  @Get()
  async list(@Query() query: ListJewelryQueryDto) {
    const { status, ownerId, search, minPrice, maxPrice } = query;
    return this.jewelry.list({ status, ownerId, search, minPrice, maxPrice }, query);
  }

  @Get(':id')
  async findById(@Param('id', ParseUUIDPipe) id: string) {
    return this.jewelry.findById(id);
  }
}
