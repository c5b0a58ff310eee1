import { Injectable } from '@nestjs/common';
import { OwnershipRegistryService } from '../../core/part-composition/ownership-registry.service';
import { PartCompositionEngine } from '../../core/part-composition/part-composition-engine.service';
import { PartSearchFilters } from '../../core/part-composition/part-composition.models';
import { PartEventLogService } from '../../core/part-composition/part-event-log.service';
import { ApprovePartDto } from './dto/approve-part.dto';
import { MintPartDto } from './dto/mint-part.dto';
import { TransferPartDto } from './dto/transfer-part.dto';

@Injectable()
export class PartsService {
  constructor(
    private readonly engine: PartCompositionEngine,
    private readonly registry: OwnershipRegistryService,
    private readonly eventLog: PartEventLogService,
  ) {}

  searchParts(filters: PartSearchFilters) {
    return this.engine.searchParts(filters);
  }

  getPartDetails(partId: number) {
    return this.engine.getPart(partId);
  }

  getAttributes(partId: number) {
    return this.engine.getAttributes(partId);
  }

  getRelations(partId: number) {
    return this.engine.getRelations(partId);
  }

  getPartEvents(partId: number) {
    this.engine.getAttributes(partId);
    return this.eventLog.listForPart(partId);
  }

  mintPart(caller: string, payload: MintPartDto) {
    const partId = this.engine.mint({
      owner: payload.owner ?? caller,
      partNumber: payload.partNumber,
      name: payload.name,
      manufacturer: payload.manufacturer,
    });

    return this.engine.getPart(partId);
  }

  transferPart(caller: string, partId: number, payload: TransferPartDto) {
    this.engine.transfer(caller, partId, payload.to, payload.from);
    return this.engine.getPart(partId);
  }

  approve(caller: string, partId: number, payload: ApprovePartDto) {
    this.registry.approve(caller, payload.approved, partId);
    return this.engine.getPart(partId);
  }
}
