/**
 * Core module index file
 */
import { initialize } from './app';

export type { AppContext } from './app';

export {
  initialize
};

export default {
  initialize
};
