import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Source imports end in .js (NodeNext); point them at the .ts files
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        if (source.startsWith('.') && source.endsWith('.js') && importer) {
          return this.resolve(source.replace(/\.js$/, '.ts'), importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/*.test.ts'],
    globals: true,
    pool: 'forks',
    env: {
      B24_DOMAIN: 'example.bitrix24.pl',
      AUTOMATION_KILL_SWITCH: 'false',
    },
  },
});
