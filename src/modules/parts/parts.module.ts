import { Module } from '@nestjs/common';
import { PartCompositionModule } from '../../core/part-composition/part-composition.module';
import { PartsController } from './parts.controller';
import { PartsService } from './parts.service';

@Module({
  imports: [PartCompositionModule],
  controllers: [PartsController],
  providers: [PartsService],
})
export class PartsModule {}
