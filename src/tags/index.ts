export { createSnapshotTagStore, type EntityScope, type LayerGroup, type TagStore } from './tag_store.js';
