import { Module, ValidationPipe } from '@nestjs/common';
import { APP_PIPE } from '@nestjs/core';
import { AccountsModule } from './modules/accounts/accounts.module';
import { AssembliesModule } from './modules/assemblies/assemblies.module';
import { HealthModule } from './modules/health/health.module';
import { PartsModule } from './modules/parts/parts.module';

@Module({
  imports: [HealthModule, PartsModule, AssembliesModule, AccountsModule],
  providers: [
    {
      provide: APP_PIPE,
      useValue: new ValidationPipe({ whitelist: true }),
    },
  ],
})
export class AppModule {}
