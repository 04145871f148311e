export { getTestApp, TestApp } from './testApp';
export { MemoryDataStore, MemoryDataStoreOptions, StoreFault } from './memoryDataStore';
