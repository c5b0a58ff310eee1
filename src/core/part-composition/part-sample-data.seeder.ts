import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { RUNTIME_SETTINGS, RuntimeSettings } from '../../runtime-env';
import { PartId } from './part-composition.models';
import { PartCompositionEngine } from './part-composition-engine.service';

const SAMPLE_MANUFACTURER = 'Northwind Mechanics';

@Injectable()
export class PartSampleDataSeeder implements OnModuleInit {
  private readonly logger = new Logger(PartSampleDataSeeder.name);

  constructor(
    private readonly engine: PartCompositionEngine,
    @Inject(RUNTIME_SETTINGS) private readonly settings: RuntimeSettings,
  ) {}

  onModuleInit(): void {
    if (!this.settings.seedSampleData) {
      return;
    }

    const owner = this.settings.sampleDataOwner;
    const mint = (partNumber: number, name: string): PartId =>
      this.engine.mint({
        owner,
        partNumber,
        name,
        manufacturer: SAMPLE_MANUFACTURER,
      });
    const assemble = (
      partNumber: number,
      name: string,
      partIds: PartId[],
    ): PartId =>
      this.engine.assemble(owner, {
        partNumber,
        name,
        manufacturer: SAMPLE_MANUFACTURER,
        partIds,
      });

    const wheelSet = assemble(2001, 'Wheel Set', [
      mint(1001, 'Front Left Wheel'),
      mint(1002, 'Front Right Wheel'),
      mint(1003, 'Rear Left Wheel'),
      mint(1004, 'Rear Right Wheel'),
    ]);
    const controllerBoard = assemble(2002, 'Controller Board', [
      mint(1005, 'CPU Module'),
      mint(1006, 'I/O Module'),
      mint(1007, 'IMU Sensor'),
    ]);
    const cart = assemble(3001, 'Autonomous Cart Assembly', [
      mint(1008, 'Base Plate'),
      wheelSet,
      controllerBoard,
      mint(1009, 'Battery Pack'),
    ]);

    this.logger.log(`Seeded sample cart assembly ${cart} for '${owner}'.`);
  }
}
