/**
 * Configuration types for the content index.
 *
 * These types define the structure of content.config.yaml. The validated
 * config is passed explicitly to EntityStore, DerivedCache and ContentIndex;
 * nothing reads it from global state.
 */

/**
 * Top-level content configuration.
 */
export interface ContentConfig {
  /** Absolute path of the markdown content root */
  rootPath: string;
  /** Folder under rootPath holding static assets (default: 'static') */
  staticAssetsFolderName: string;
  /** Identifier of the entity store (default: 'content') */
  cacheName: string;
  /** Identifier of the derived tree cache (default: 'content-index') */
  indexCacheName: string;
  /** Remote repository to sync content from; null disables remote sync */
  remoteRepositoryUrl: string | null;
  /** How often pending local file events are rechecked, in ms */
  recheckPendingFileEventsInterval: number;
  /** How often the remote repository is rechecked, in ms */
  recheckPendingRemoteEventsInterval: number;
}

/**
 * Subset of the config the path helpers need.
 */
export type ContentPathsConfig = Pick<ContentConfig, 'rootPath' | 'staticAssetsFolderName'>;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ContentConfig = {
  rootPath: './content',
  staticAssetsFolderName: 'static',
  cacheName: 'content',
  indexCacheName: 'content-index',
  remoteRepositoryUrl: null,
  recheckPendingFileEventsInterval: 1000,
  recheckPendingRemoteEventsInterval: 5000,
};
