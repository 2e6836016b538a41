import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Setting } from '@common/entities/setting.entity';
import type { SettingEntry } from '../interfaces/catalog.interface';

const TRUTHY_VALUES = ['true', '1', 'yes', 'on'];

@Injectable()
export class SettingsService {
  constructor(@InjectRepository(Setting) private readonly settingsRepository: Repository<Setting>) {}

  async list(): Promise<Setting[]> {
    return this.settingsRepository.find({ order: { key: 'ASC' } });
  }

  async get(key: string): Promise<Setting | null> {
    return this.settingsRepository.findOneBy({ key });
  }

  async getValue(key: string, fallback: string): Promise<string> {
    const setting = await this.get(key);
    const value = setting?.value.trim();
    return value ? value : fallback;
  }

  async getBoolean(key: string, fallback: boolean): Promise<boolean> {
    const setting = await this.get(key);
    if (!setting) return fallback;
    return TRUTHY_VALUES.includes(setting.value.trim().toLowerCase());
  }

  async upsertMany(entries: SettingEntry[]): Promise<Setting[]> {
    const settings: Setting[] = [];
    for (const entry of entries) {
      const setting = (await this.get(entry.key)) ?? this.settingsRepository.create({ key: entry.key });
      setting.value = entry.value;
      if (entry.description !== undefined) {
        setting.description = entry.description;
      }
      settings.push(setting);
    }
    return this.settingsRepository.save(settings);
  }

  /** Inserts the given entries whose keys are not stored yet; returns how many were added. */
  async ensureDefaults(defaults: SettingEntry[]): Promise<number> {
    const existing = new Set((await this.list()).map((setting) => setting.key));
    const missing = defaults.filter((entry) => !existing.has(entry.key));
    if (missing.length) {
      await this.settingsRepository.save(
        missing.map((entry) => this.settingsRepository.create({ ...entry, description: entry.description ?? null })),
      );
    }
    return missing.length;
  }
}
