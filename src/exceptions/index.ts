export * from '@E/FatalLogError';
export * from '@E/LogConfigurationError';
