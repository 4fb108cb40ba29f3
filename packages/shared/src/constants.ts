export const HOSTPULSE_VERSION = '1.0.0';

export const HOSTPULSE_CONFIG_FILE = 'hostpulse.config.json';

export const DEFAULT_ENDPOINT = 'http://localhost:25800';
export const DEFAULT_INTERVAL = '1s';
export const DEFAULT_CPU_SAMPLE_WINDOW = '200ms';
export const DEFAULT_SEND_TIMEOUT = '5s';
export const DEFAULT_PROC_ROOT = '/proc';

// Largest delay setTimeout and setInterval honour; longer ones fire after 1ms.
export const MAX_TIMER_DELAY = 2_147_483_647;

export const ENV_ENDPOINT = 'HOSTPULSE_ENDPOINT';
export const ENV_TOKEN = 'HOSTPULSE_TOKEN';
