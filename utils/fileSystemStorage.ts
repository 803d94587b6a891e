import fs from 'fs';
import path from 'path';

// Thin synchronous JSON file helpers shared by the collection and user stores.
export const FileSystemStorage = {
  // Create the directory (and parents) if it is missing
  ensureDir(dir: string): void {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  },

  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  },

  // Read and parse a JSON file; null when it does not exist
  readJson(filePath: string): unknown {
    if (!fs.existsSync(filePath)) return null;
    const raw = fs.readFileSync(filePath, 'utf-8');
    return JSON.parse(raw);
  },

  // Write through a temp file, then rename into place
  writeJsonAtomic(filePath: string, data: unknown): void {
    this.ensureDir(path.dirname(filePath));
    const tmp = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      fs.writeFileSync(tmp, JSON.stringify(data, null, 2), 'utf-8');
      fs.renameSync(tmp, filePath);
    } catch (error) {
      if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
      throw error;
    }
  },
};
