import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { vi } from 'vitest';

// Mock environment variables
process.env.AWS_REGION = 'us-east-1';
process.env.NODE_ENV = 'test';

// Nest's static Logger is used by use cases and adapters
Logger.overrideLogger(false);

// Increase timeout for async operations
vi.setConfig({ testTimeout: 10000 });
