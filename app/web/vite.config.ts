import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  resolve: {
    // The library workspace is linked into node_modules; keep a single React copy.
    dedupe: ['react', 'react-dom']
  },
  server: {
    port: 5173,
    strictPort: true
  }
});
