import { PlatformSetting } from '../models/PlatformSetting';
import { settings } from '../config/settings';
import type { SupportedPlatform } from '../types/platform';

export class PlatformSettingService {
  constructor(private readonly defaultMinimum: number = settings.verification.defaultMinimumFollowers) {}

  async getMinimumFollowers(platform: SupportedPlatform): Promise<number> {
    const row = await PlatformSetting.findOne({ where: { platform } });
    return row ? row.minimum_followers : this.defaultMinimum;
  }

  /** Inactive platforms get no automated verification. */
  async isActive(platform: SupportedPlatform): Promise<boolean> {
    const row = await PlatformSetting.findOne({ where: { platform } });
    return row ? row.is_active : true;
  }

  async upsert(platform: SupportedPlatform, values: { minimumFollowers?: number; isActive?: boolean }) {
    const [row] = await PlatformSetting.findOrCreate({
      where: { platform },
      defaults: { platform, minimum_followers: this.defaultMinimum, is_active: true },
    });
    if (values.minimumFollowers !== undefined) row.minimum_followers = values.minimumFollowers;
    if (values.isActive !== undefined) row.is_active = values.isActive;
    return row.save();
  }

  async list() {
    return PlatformSetting.findAll({ order: [['platform', 'ASC']] });
  }
}

export const platformSettingService = new PlatformSettingService();
