import { Body, Controller, Get, Param, Put } from '@nestjs/common';
import { Caller } from '../../common/caller.decorator';
import { AccountsService } from './accounts.service';
import { SetOperatorDto } from './dto/set-operator.dto';

@Controller('accounts')
export class AccountsController {
  constructor(private readonly accountsService: AccountsService) {}

  @Get(':account/parts')
  getOwnedParts(@Param('account') account: string) {
    return this.accountsService.getOwnedParts(account);
  }

  @Put(':account/operators/:operator')
  setOperator(
    @Caller() caller: string,
    @Param('account') account: string,
    @Param('operator') operator: string,
    @Body() payload: SetOperatorDto,
  ) {
    return this.accountsService.setOperator(caller, account, operator, payload);
  }
}
