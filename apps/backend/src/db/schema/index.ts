// Export all schemas from this file
export * from './acme-users.schema';
export * from './dns-providers.schema';
export * from './ssl-certs.schema';
export * from './ssl-policies.schema';
export * from './servers.schema';
export * from './acme-tasks.schema';
export * from './acme-authentications.schema';
export * from './acme-task-logs.schema';
