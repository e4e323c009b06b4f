export interface FileRecord {
  path: string // absolute filesystem path
  checksum: string // hex digest
  isSymlink: boolean
  isLinked: boolean // already hard-linked with another path of the same checksum
}

export interface UpsertOptions {
  /** Keep the record marked as linked instead of resetting the flag. */
  linked?: boolean
}

export interface DuplicateGroup {
  checksum: string
  records: FileRecord[]
}
