import { setLogLevel } from './src/logger.js';

setLogLevel('silent');
