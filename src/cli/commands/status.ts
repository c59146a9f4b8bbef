import type { Config } from '../../core/config.js'
import { LanceStorage } from '../../storage/lance.js'
import { SqliteStorage } from '../../storage/sqlite.js'

export async function runStatus(config: Config): Promise<void> {
  const sqlite = SqliteStorage.fromConfig(config)
  const lance = new LanceStorage(config)

  try {
    const stats = sqlite.getStats()
    const vectorCount = await lance.count()

    console.log('\nAgent Runtime Status')
    console.log('====================')
    console.log(`Agents:            ${stats.agent_count} (${stats.archived_agent_count} archived)`)
    console.log(`Contract Versions: ${stats.version_count}`)
    console.log(`Cached Prompts:    ${stats.cached_prompt_count}`)
    console.log(`Threads:           ${stats.thread_count}`)
    console.log(`Messages:          ${stats.message_count}`)
    console.log(`Memories:          ${stats.memory_count}`)
    console.log(`Vector Embeddings: ${vectorCount}`)
    console.log(`Last Validation:   ${stats.last_validation_at ?? 'never'}`)
    console.log()
  } finally {
    sqlite.close()
  }
}
