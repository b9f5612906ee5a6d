export type {
  DescriptorSource,
  InvalidDescriptor,
  RegistryEntry,
  RegistrySnapshot,
} from './types.js';
export { TableRegistry, type TableRegistryOptions } from './registry.js';
export { createTableDescriptorSchema, registryDocumentSchema, formatZodError } from './schema.js';
