import { Injectable } from '@nestjs/common';
import { unauthorized } from '../../core/part-composition/part-composition.errors';
import { OwnershipRegistryService } from '../../core/part-composition/ownership-registry.service';
import { SetOperatorDto } from './dto/set-operator.dto';

@Injectable()
export class AccountsService {
  constructor(private readonly registry: OwnershipRegistryService) {}

  getOwnedParts(account: string) {
    return {
      account,
      balance: this.registry.balanceOf(account),
      partIds: this.registry.partsOwnedBy(account),
    };
  }

  setOperator(
    caller: string,
    account: string,
    operator: string,
    payload: SetOperatorDto,
  ) {
    if (caller !== account) {
      throw unauthorized(
        `Account '${caller}' cannot manage operators for '${account}'.`,
      );
    }

    const delegate = operator.trim();
    this.registry.setApprovalForAll(account, delegate, payload.approved);

    return {
      account,
      operator: delegate,
      approved: this.registry.isApprovedForAll(account, delegate),
    };
  }
}
