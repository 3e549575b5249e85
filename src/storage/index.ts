export {
    VersionedOutputStore,
    type ArtifactMetadata,
    type LatestAlias,
    type SaveRequest,
    type StoredArtifact,
} from './versionedStore';
export { CSV_HEADER, CsvFormatError, decodeRows, encodeRows, formatWeight } from './csv';
