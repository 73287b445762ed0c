export * from './mock-platforms';
export * from './test-data-factories';
