import { Inject, Injectable } from '@nestjs/common';
import { JewelryStatus, NotFoundError } from '@gemhouse/shared';
import { AUCTION_STORE, AuctionStore } from '../../../database/auction-store';
import { PageQuery, Paginated, pageWindow, toPage } from '../../../common/utils/pagination';
import { JewelryItem } from '../entities/jewelry-item.entity';

export interface JewelryFilters {
  status?: JewelryStatus;
  ownerId?: string;
  /** Matched against title, description and code. */
  search?: string;
  minPrice?: string;
  maxPrice?: string;
}

@Injectable()
export class JewelryService {
  constructor(@Inject(AUCTION_STORE) private readonly store: AuctionStore) {}

  async findById(id: string): Promise<JewelryItem> {
    const item = await this.store.manager.findOne(JewelryItem, { id });
    if (!item) {
      throw new NotFoundError('JewelryItem', id);
    }
    return item;
  }

  async list(filters: JewelryFilters, query: PageQuery): Promise<Paginated<JewelryItem>> {
    const window = pageWindow(query);
    const hasRange = filters.minPrice !== undefined || filters.maxPrice !== undefined;

    const [data, total] = await this.store.manager.findAndCount(JewelryItem, {
      where: { status: filters.status, ownerId: filters.ownerId },
      search: filters.search
        ? { columns: ['title', 'description', 'code'], term: filters.search }
        : undefined,
      range: hasRange
        ? { column: 'estimatedPrice', min: filters.minPrice, max: filters.maxPrice }
        : undefined,
      skip: window.skip,
      take: window.limit,
    });
    return toPage(data, total, window);
  }
}
