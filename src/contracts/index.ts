export {
  ComponentRecordSchema,
  DependencyRecordSchema,
  EndpointRecordSchema,
  GraphSnapshotSchema,
  LayerRecordSchema,
  ReferenceDefinitionInputSchema,
  ReferenceDefinitionSchema,
  ReferenceRegistryInputSchema,
  parseGraphSnapshot,
  parseReferenceDefinitionInput,
  parseReferenceRegistryInput,
} from './snapshot_schema.js';
