export * from '@U/config.utils';
export * from '@U/format.utils';
export * from '@U/console.utils';
export * from '@U/debug.utils';
export * from '@U/template.utils';
export * from '@U/logger.utils';
