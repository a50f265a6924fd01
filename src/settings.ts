/**
 * Base URL of the Agua IoT cloud platform (Micronova)
 */
export const API_URL = 'https://micronova.agua-iot.com';

export const API_PATH_APP_SIGNUP = '/appSignup';
export const API_PATH_LOGIN = '/userLogin';
export const API_PATH_REFRESH_TOKEN = '/refreshToken';
export const API_PATH_DEVICE_LIST = '/deviceList';
export const API_PATH_DEVICE_INFO = '/deviceGetInfo';
export const API_PATH_DEVICE_REGISTERS_MAP = '/deviceGetRegistersMap';
export const API_PATH_DEVICE_BUFFER_READING = '/deviceGetBufferReading';
export const API_PATH_DEVICE_JOB_STATUS = '/deviceJobStatus/';
export const API_PATH_DEVICE_WRITING = '/deviceRequestWriting';

/**
 * Eva Calor brand identifiers sent on every request
 */
export const EVA_CALOR_CUSTOMER_CODE = '635987';
export const EVA_CALOR_BRAND_ID = '1';

export const DEFAULT_REQUEST_TIMEOUT = 10_000;

/**
 * Job polling: the remote answers reads and writes asynchronously.
 */
export const DEFAULT_JOB_POLL_INTERVAL = 1_000;
export const DEFAULT_JOB_POLL_RETRIES = 10;

/**
 * A token expiring within this window is treated as expired.
 */
export const DEFAULT_TOKEN_EXPIRY_MARGIN = 5 * 60 * 1000;

// Sent as `last_update` when requesting a registers map
export const REGISTERS_MAP_LAST_UPDATE = '2018-06-03T08:59:54.043';
