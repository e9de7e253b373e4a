import { Logger } from '@nestjs/common';

/** The subset of Nest's Logger the framework-free libraries log through */
export type EngineLogger = Pick<Logger, 'log' | 'warn' | 'debug'>;
