export * from './dns-provider.interface';
