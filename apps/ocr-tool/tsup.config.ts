import { defineConfig } from '@ocrflow/tsup-config';

export default defineConfig({
  entry: {
    cli: 'src/cli.ts',
    index: 'src/index.ts',
  },
});
