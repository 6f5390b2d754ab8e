export const SETTINGS_PROVIDER = 'SettingsProvider';

export type UserSettings = Record<string, unknown>;

export interface SettingsProvider {
  get(owner: string): Promise<UserSettings>;
}
