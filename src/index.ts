export * from '@I/index';
export * from '@E/index';
export * from '@U/index';
