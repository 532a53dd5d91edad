// Module
export * from './shared.module';

// Types
export * from './types/command.types';
export * from './types/status.types';
export * from './types/presence.types';
export * from './types/session.types';

// Config
export * from './config/configuration';
export * from './config/validation.schema';

// Utils
export * from './utils/file.utils';
export * from './utils/command.utils';
export * from './utils/status.utils';
export * from './utils/permissions.utils';
