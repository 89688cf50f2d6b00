// This module centralizes service identity values used in logs.

export const SERVICE_NAME = 'add-gateway';
export const SERVICE_VERSION = '0.1.0';
