import react from "@vitejs/plugin-react";
import { defineConfig } from "vite";

export default defineConfig({
  plugins: [react()],
  build: {
    rollupOptions: {
      output: {
        manualChunks: {
          // Scoring engines (needed by Dashboard)
          'engine-core': [
            './src/engine/feature-builder.ts',
            './src/engine/scoring.ts',
            './src/engine/health-score.ts',
            './src/engine/forecast.ts',
          ],
          'engine-advisor': [
            './src/engine/ai-context.ts',
            './src/engine/profile-csv.ts',
          ],
          // React + vendor
          'vendor-react': ['react', 'react-dom'],
          'vendor-charts': ['recharts'],
        },
      },
    },
  },
});
