export * from '@I/logger.interfaces';
