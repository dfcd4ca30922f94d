/**
 * Platform name as it must appear under "platforms" in config.json.
 */
export const PLATFORM_NAME = 'YeelightLan';

/**
 * Must match the "name" field in package.json.
 */
export const PLUGIN_NAME = 'homebridge-yeelight-lan';
