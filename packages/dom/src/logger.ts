import { createLogger } from '@loading-kit/shared';

export const logger = createLogger('loading-kit:dom');
