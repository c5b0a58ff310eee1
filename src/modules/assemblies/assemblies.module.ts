import { Module } from '@nestjs/common';
import { PartCompositionModule } from '../../core/part-composition/part-composition.module';
import { AssembliesController } from './assemblies.controller';
import { AssembliesService } from './assemblies.service';

@Module({
  imports: [PartCompositionModule],
  controllers: [AssembliesController],
  providers: [AssembliesService],
})
export class AssembliesModule {}
