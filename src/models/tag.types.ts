export type Tag =
  | 'init'
  | 'configuration'
  | 'pipeline'
  | 'exchange'
  | 'validation'
  | 'analysis'
  | 'export'
  | 'storage'
  | 'report';
