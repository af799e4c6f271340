import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './dto/environment.dto';
import { MetricsModule } from './metrics/metrics.module';
import { CatalogIoModule } from './modules/catalog-io.module';
import { PipelineModule } from './modules/pipeline.module';
import { CatalogRunnerService } from './services/catalog-runner.service';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env', validate: validateEnvironment }),
    MetricsModule,
    PipelineModule,
    CatalogIoModule,
  ],
  providers: [CatalogRunnerService],
  exports: [CatalogRunnerService],
})
export class AppModule {}
