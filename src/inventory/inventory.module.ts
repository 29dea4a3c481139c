import { Module } from '@nestjs/common';
import { InventoryService } from './inventory.service';
import { DEFAULT_STOCK, INITIAL_STOCK, INVENTORY } from './inventory.constants';

@Module({
  providers: [
    {
      provide: INITIAL_STOCK,
      useValue: DEFAULT_STOCK,
    },
    {
      provide: INVENTORY,
      useClass: InventoryService,
    },
  ],
  exports: [INVENTORY],
})
export class InventoryModule {}
