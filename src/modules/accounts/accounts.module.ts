import { Module } from '@nestjs/common';
import { PartCompositionModule } from '../../core/part-composition/part-composition.module';
import { AccountsController } from './accounts.controller';
import { AccountsService } from './accounts.service';

@Module({
  imports: [PartCompositionModule],
  controllers: [AccountsController],
  providers: [AccountsService],
})
export class AccountsModule {}
