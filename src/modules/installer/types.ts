/**
 * Installer kinds and the classified installer record.
 * Sibling files import from here rather than from index.ts.
 */

/** `.sh` self-extracting Linux archive, or `.exe` Inno Setup package. */
export type InstallerKind = "linuxArchive" | "windowsPackage";

export interface Installer {
  /** Absolute, symlink-resolved path to the installer file */
  path: string;
  kind: InstallerKind;
  /** File name without directory, e.g. "setup_ultima_vii_1.0.exe" */
  basename: string;
}
