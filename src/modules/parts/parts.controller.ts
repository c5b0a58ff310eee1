import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { Caller } from '../../common/caller.decorator';
import { ApprovePartDto } from './dto/approve-part.dto';
import { MintPartDto } from './dto/mint-part.dto';
import { TransferPartDto } from './dto/transfer-part.dto';
import { PartsService } from './parts.service';

@Controller('parts')
export class PartsController {
  constructor(private readonly partsService: PartsService) {}

  @Get()
  searchParts(
    @Query('owner') owner?: string,
    @Query('name') name?: string,
    @Query('manufacturer') manufacturer?: string,
    @Query('q') q?: string,
  ) {
    return this.partsService.searchParts({ owner, name, manufacturer, q });
  }

  @Post()
  mintPart(@Caller() caller: string, @Body() payload: MintPartDto) {
    return this.partsService.mintPart(caller, payload);
  }

  @Get(':partId/attributes')
  getAttributes(@Param('partId', ParseIntPipe) partId: number) {
    return this.partsService.getAttributes(partId);
  }

  @Get(':partId/relations')
  getRelations(@Param('partId', ParseIntPipe) partId: number) {
    return this.partsService.getRelations(partId);
  }

  @Get(':partId/events')
  getPartEvents(@Param('partId', ParseIntPipe) partId: number) {
    return this.partsService.getPartEvents(partId);
  }

  @Post(':partId/transfer')
  @HttpCode(HttpStatus.OK)
  transferPart(
    @Caller() caller: string,
    @Param('partId', ParseIntPipe) partId: number,
    @Body() payload: TransferPartDto,
  ) {
    return this.partsService.transferPart(caller, partId, payload);
  }

  @Post(':partId/approval')
  @HttpCode(HttpStatus.OK)
  approve(
    @Caller() caller: string,
    @Param('partId', ParseIntPipe) partId: number,
    @Body() payload: ApprovePartDto,
  ) {
    return this.partsService.approve(caller, partId, payload);
  }

  @Get(':partId')
  getPartDetails(@Param('partId', ParseIntPipe) partId: number) {
    return this.partsService.getPartDetails(partId);
  }
}
