import { getLogger as getPlatformLogger, type Logger } from '@chipstream/platform-core';

export const SERVICE_NAME = 'catalog-service';

export function getLogger(moduleName: string): Logger {
  return getPlatformLogger(`${SERVICE_NAME}:${moduleName}`);
}
