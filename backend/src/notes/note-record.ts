/**
 * Note Record
 *
 * Metadata for one scanned note. Produced by the scanner, read by the
 * selection engine and the prompt builder.
 */

export interface NoteRecord {
  /** POSIX-style path relative to the folder it was scanned from; unique per scan */
  relativePath: string;
  absolutePath: string;
  /** Name of the directory holding the note */
  folderName: string;
  /** Last modification time; null when unknown */
  modifiedAt: Date | null;
  createdAt: Date | null;
  sizeBytes: number;
  /** Normalized priority string ("high", "medium", "low" or "") */
  priority: string;
  /** YYYY-MM-DD, or null when absent */
  deadline: string | null;
  tags: string[];
  uncheckedCount: number;
  checkedCount: number;
  frontmatter: Record<string, unknown>;
  /** Body without frontmatter */
  content: string;
}
