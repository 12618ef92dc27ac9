import "dotenv/config"
import { createApp, SERVICE_NAME } from "./app"
import { loadConfig } from "./lib/config"
import { initProviders } from "./services/providers"

const config = loadConfig()
const providers = initProviders(config)
const app = createApp({ config, providers })

app.listen(config.port, () => {
  console.log(`[server] ${SERVICE_NAME} ${config.appVersion} listening on http://localhost:${config.port}`)
})
