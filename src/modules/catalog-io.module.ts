import { Module } from '@nestjs/common';
import { CatalogWriterService } from '../services/catalog-writer.service';
import { SourceLoaderService } from '../services/source-loader.service';

@Module({
  providers: [SourceLoaderService, CatalogWriterService],
  exports: [SourceLoaderService, CatalogWriterService],
})
export class CatalogIoModule {}
