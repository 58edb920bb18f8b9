import { APP_CONFIG } from './config';
import { CricketService } from './api/cricketService';
import { createApp } from './api/server';

const service = new CricketService(APP_CONFIG);
const app = createApp(service);

app.listen(APP_CONFIG.port, () => {
  console.log({ port: APP_CONFIG.port, provider: APP_CONFIG.provider }, 'Cricket API rodando');
  console.log(`Teste rápido: http://localhost:${APP_CONFIG.port}/api/matches?type=live`);
});
