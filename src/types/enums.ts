// Visibility of a tracked element as of the latest merge
export enum VisibilityState {
  VISIBLE = 'visible',
  REMOVED = 'removed',
  HIDDEN = 'hidden',
}

// Which resolver step produced an element id
export enum IdentitySource {
  ATTRIBUTE = 'attribute',
  CONTENT_HASH = 'content-hash',
}
