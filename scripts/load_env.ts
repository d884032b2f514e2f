// Imported first by scripts so modules that read process.env at load see the files.
import { loadEnvFiles } from '../src/core/env_files';

loadEnvFiles(process.cwd());
