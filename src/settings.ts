// src/settings.ts

/** Name users put under "platform" in config.json. */
export const PLATFORM_NAME = 'HomeHub';

/** Must match the "name" in package.json. */
export const PLUGIN_NAME = 'homebridge-homehub';
