import app from './src';
import { DEFAULT_PORT } from './src/config';

(async () => {
  const server = await app();
  return server.listen({
    port: parseInt(process.env.PORT ?? '', 10) || DEFAULT_PORT,
    host: '0.0.0.0',
  });
})().catch((err) => {
  console.error(err);
  process.exit(1);
});
