export enum NodeKind {
  Root = 'root',
  Directory = 'directory',
  File = 'file',
  PermissionError = 'permission-error',
}
