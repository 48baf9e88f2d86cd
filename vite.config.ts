import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

const HOST_URL = `http://127.0.0.1:${process.env.PORT ?? '4178'}`;

export default defineConfig({
  plugins: [react()],
  server: {
    proxy: {
      '/api': HOST_URL,
      '/dataset': HOST_URL
    }
  },
  build: {
    outDir: 'dist'
  }
});
