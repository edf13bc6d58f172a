import { configureLogging } from '../logger.js';

// Lines still reach the log feed; only console output is muted
configureLogging({ console: false });
