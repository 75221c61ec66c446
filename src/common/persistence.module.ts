import { Global, Module } from '@nestjs/common';
import { DatabaseService } from './database.service.js';
import { RatioSnapshotRepository } from '../persistence/repositories/ratio-snapshot.repository.js';
import { RatioAlertRepository } from '../persistence/repositories/ratio-alert.repository.js';
import { VolumeRatioRepository } from '../persistence/repositories/volume-ratio.repository.js';

/**
 * Global persistence module providing database access.
 * DatabaseService and the repositories are available to all modules
 * without explicit imports.
 */
@Global()
@Module({
  providers: [
    DatabaseService,
    RatioSnapshotRepository,
    RatioAlertRepository,
    VolumeRatioRepository,
  ],
  exports: [
    DatabaseService,
    RatioSnapshotRepository,
    RatioAlertRepository,
    VolumeRatioRepository,
  ],
})
export class PersistenceModule {}
