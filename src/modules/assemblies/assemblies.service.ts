import { BadRequestException, Injectable } from '@nestjs/common';
import { PartCompositionEngine } from '../../core/part-composition/part-composition-engine.service';
import { MAX_TREE_DEPTH } from '../../core/part-composition/part-composition.models';
import { AssemblePartsDto } from './dto/assemble-parts.dto';
import { AttachPartsDto } from './dto/attach-parts.dto';

@Injectable()
export class AssembliesService {
  constructor(private readonly engine: PartCompositionEngine) {}

  getAssemblyTree(rootPartId: number, depthQuery?: string) {
    const depth = this.parseDepth(depthQuery);

    return this.engine.getAssemblyTree(rootPartId, depth);
  }

  assemble(caller: string, payload: AssemblePartsDto) {
    const assemblyId = this.engine.assemble(caller, {
      partNumber: payload.partNumber,
      name: payload.name,
      manufacturer: payload.manufacturer,
      partIds: payload.partIds,
    });

    return this.engine.getPart(assemblyId);
  }

  disassemble(caller: string, assemblyId: number) {
    return this.engine.disassemble(caller, assemblyId);
  }

  attach(caller: string, assemblyId: number, payload: AttachPartsDto) {
    this.engine.attach(caller, assemblyId, payload.partIds);
    return this.engine.getPart(assemblyId);
  }

  detach(caller: string, assemblyId: number, partId: number) {
    return this.engine.detach(caller, assemblyId, partId);
  }

  private parseDepth(depthQuery?: string): number {
    if (!depthQuery) {
      return 1;
    }

    if (depthQuery.toLowerCase() === 'all') {
      return MAX_TREE_DEPTH;
    }

    const parsed = Number.parseInt(depthQuery, 10);
    if (Number.isNaN(parsed)) {
      throw new BadRequestException('Depth must be a number or "all".');
    }

    return parsed;
  }
}
