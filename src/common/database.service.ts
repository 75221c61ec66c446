import {
  Injectable,
  Logger,
  type OnModuleDestroy,
  type OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import mongoose, { type Connection, type Model } from 'mongoose';
import {
  RatioAlertSchema,
  RatioSnapshotSchema,
  VolumeRatioSchema,
  type RatioAlertRecord,
  type RatioSnapshotRecord,
  type VolumeRatioRecord,
} from '../persistence/models/index.js';

const CONNECTED = 1;

/**
 * Owns the MongoDB connection and the models bound to it.
 * History is optional: without MONGODB_URI the connection stays closed and
 * callers check `isConnected()` before touching the models.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly connection: Connection;
  readonly ratioSnapshots: Model<RatioSnapshotRecord>;
  readonly ratioAlerts: Model<RatioAlertRecord>;
  readonly volumeRatios: Model<VolumeRatioRecord>;

  constructor(private readonly configService: ConfigService) {
    this.connection = mongoose.createConnection();
    this.ratioSnapshots = this.connection.model<RatioSnapshotRecord>(
      'RatioSnapshot',
      RatioSnapshotSchema,
    );
    this.ratioAlerts = this.connection.model<RatioAlertRecord>(
      'RatioAlert',
      RatioAlertSchema,
    );
    this.volumeRatios = this.connection.model<VolumeRatioRecord>(
      'VolumeRatio',
      VolumeRatioSchema,
    );
  }

  async onModuleInit(): Promise<void> {
    const uri = this.configService.get<string>('MONGODB_URI', '');
    if (!this.isEnabled()) {
      this.logger.warn({
        message: 'MONGODB_URI not set, history persistence disabled',
        module: 'persistence',
      });
      return;
    }

    await this.connection.openUri(uri, {
      serverSelectionTimeoutMS: Number(
        this.configService.get<string | number>('MONGODB_TIMEOUT_MS', 5000),
      ),
      bufferCommands: false,
    });
    this.logger.log({
      message: 'Database connected',
      module: 'persistence',
      database: this.connection.name,
    });
  }

  async onModuleDestroy(): Promise<void> {
    if (this.connection.readyState !== 0) {
      await this.connection.close();
    }
  }

  /** False when no MONGODB_URI is configured. */
  isEnabled(): boolean {
    return this.configService.get<string>('MONGODB_URI', '') !== '';
  }

  isConnected(): boolean {
    return this.connection.readyState === CONNECTED;
  }
}
