import { join } from "node:path";
import { tmpdir } from "node:os";

/** REPL command history, shared by every run on this machine. */
export const HISTORY_FILE = join(tmpdir(), ".evaldbg-history");
