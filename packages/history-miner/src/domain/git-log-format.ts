export const COMMIT_RECORD_SEPARATOR = "\u001e";
export const COMMIT_FIELD_SEPARATOR = "\u001f";

// hash, parents, committer time, author name, author email, raw body
export const GIT_LOG_FORMAT = "%x1e%H%x1f%P%x1f%ct%x1f%an%x1f%ae%x1f%B";
