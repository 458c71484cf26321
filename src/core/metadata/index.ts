export {
  MetadataError,
  metadataPath,
  parseMetadata,
  readMetadata,
  toMetadataFile,
  writeMetadata,
} from "./store";
