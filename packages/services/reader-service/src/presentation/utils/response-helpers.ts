/**
 * Standardized Response Helpers for reader-service
 */

import { createResponseHelpers, createValidation } from '@folio/platform-core';
import { SERVICE_NAME } from '../../config/service-config';

const helpers = createResponseHelpers(SERVICE_NAME);

export const { sendSuccess, ServiceErrors } = helpers;
export const { validateRequest } = createValidation(SERVICE_NAME);
