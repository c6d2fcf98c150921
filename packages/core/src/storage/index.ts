export { InMemoryKeyValueStore, type KeyValueStore, type KeyValueEntry } from './kv-store.js';
export { EnvironmentRepository, ENVIRONMENT_KEY_PREFIX, environmentKey } from './environment-repository.js';
