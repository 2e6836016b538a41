import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { DEFAULT_SERVICES, DEFAULT_SETTINGS } from '../constants/default-catalog';
import { PrintServicesService } from './print-services.service';
import { SettingsService } from './settings.service';

/** Fills an empty catalog with the default services and any missing settings. */
@Injectable()
export class CatalogSeedService implements OnApplicationBootstrap {
  private readonly logger = new Logger(CatalogSeedService.name);

  constructor(
    private readonly printServicesService: PrintServicesService,
    private readonly settingsService: SettingsService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.seed();
  }

  async seed(): Promise<void> {
    if ((await this.printServicesService.count()) === 0) {
      for (const service of DEFAULT_SERVICES) {
        await this.printServicesService.create(service);
      }
      this.logger.log(`Seeded ${DEFAULT_SERVICES.length} default services`);
    }

    const added = await this.settingsService.ensureDefaults(DEFAULT_SETTINGS);
    if (added) {
      this.logger.log(`Seeded ${added} default settings`);
    }
  }
}
