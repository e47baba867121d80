/**
 * Standardized Response Helpers for catalog-service
 */

import { createResponseHelpers } from '@chipstream/platform-core';
import { SERVICE_NAME } from '../../config/logger';

const helpers = createResponseHelpers(SERVICE_NAME);

export const { sendSuccess, sendCreated, ServiceErrors } = helpers;
