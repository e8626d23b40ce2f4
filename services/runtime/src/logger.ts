import { makeLogger } from '@ledge/logger';

export const logger = makeLogger('runtime');
