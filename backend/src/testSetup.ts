import { tmpdir } from 'os';
import { join } from 'path';

// Keep test runs from writing log files into the working tree
process.env.LOG_DIR = join(tmpdir(), 'frp-orchestrator-test-logs');
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
