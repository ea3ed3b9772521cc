import { Module } from '@nestjs/common';
import { WarehouseWriterService } from './warehouse-writer.service';
import { ExportService } from './export.service';

@Module({
  providers: [WarehouseWriterService, ExportService],
  exports: [WarehouseWriterService, ExportService],
})
export class WarehouseModule {}
