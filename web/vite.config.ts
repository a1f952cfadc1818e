import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// Dev proxy expects the API server (npm run dev:server) on port 8787.
// Adjust target as needed.
export default defineConfig({
  plugins: [react()],
  server: {
    proxy: {
      '/api': {
        target: process.env.VITE_API_PROXY_TARGET ?? 'http://127.0.0.1:8787',
        changeOrigin: true,
      },
    },
  },
})
