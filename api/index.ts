// Filename: api/index.ts

import { loadEnvFiles, loadServiceConfig } from '../config/configService.js';
import { startServer } from './server.js';

loadEnvFiles();
startServer(loadServiceConfig());
