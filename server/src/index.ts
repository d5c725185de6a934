import { createApp } from "./app"
import { loadConfig } from "./config"
import { configureCache } from "./lib/cache"

const config = loadConfig()
configureCache(config.cacheDir)
const app = createApp(config)

app.listen(config.port, () => {
  console.log(`[server] listening on http://localhost:${config.port}`)
})
