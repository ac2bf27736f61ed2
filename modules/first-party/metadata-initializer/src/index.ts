/**
 * @plinth/module-metadata-initializer
 *
 * First-party initializer recording instantiation args per instance.
 */

export {
  METADATA_INITIALIZER_BYTECODE,
  METADATA_INITIALIZER_KIND,
  MetadataRequired,
  metadataInitializer,
  metadataInitializerResolver,
  readMetadata,
} from './initializer.js';
