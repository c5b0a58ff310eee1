import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { Caller } from '../../common/caller.decorator';
import { AssembliesService } from './assemblies.service';
import { AssemblePartsDto } from './dto/assemble-parts.dto';
import { AttachPartsDto } from './dto/attach-parts.dto';

@Controller('assemblies')
export class AssembliesController {
  constructor(private readonly assembliesService: AssembliesService) {}

  @Post()
  assemble(@Caller() caller: string, @Body() payload: AssemblePartsDto) {
    return this.assembliesService.assemble(caller, payload);
  }

  @Get(':partId/tree')
  getAssemblyTree(
    @Param('partId', ParseIntPipe) partId: number,
    @Query('depth') depth?: string,
  ) {
    return this.assembliesService.getAssemblyTree(partId, depth);
  }

  @Delete(':assemblyId')
  disassemble(
    @Caller() caller: string,
    @Param('assemblyId', ParseIntPipe) assemblyId: number,
  ) {
    return this.assembliesService.disassemble(caller, assemblyId);
  }

  @Post(':assemblyId/parts')
  attach(
    @Caller() caller: string,
    @Param('assemblyId', ParseIntPipe) assemblyId: number,
    @Body() payload: AttachPartsDto,
  ) {
    return this.assembliesService.attach(caller, assemblyId, payload);
  }

  @Delete(':assemblyId/parts/:partId')
  detach(
    @Caller() caller: string,
    @Param('assemblyId', ParseIntPipe) assemblyId: number,
    @Param('partId', ParseIntPipe) partId: number,
  ) {
    return this.assembliesService.detach(caller, assemblyId, partId);
  }
}
