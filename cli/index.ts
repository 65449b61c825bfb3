#!/usr/bin/env node

/**
 * notebook-workspace - inspect and maintain a workspace directory
 */

import { Command } from 'commander'
import * as fs from 'fs-extra'
import * as path from 'path'
import chalk from 'chalk'
import { format } from 'date-fns'
import { analyzeNotebook, validateNotebook } from '../lib/notebook/notebook-codec'
import { describeError } from '../lib/notebook/errors'
import { parseWorkspaceCategory, WORKSPACE_CATEGORY_LABELS, type WorkspaceMetadataRecord } from '../lib/workspaces/types'
import { WorkspaceMetadataStore } from '../lib/workspaces/workspace-metadata-store'

interface GlobalOptions {
  root?: string
}

interface ListOptions {
  templates?: boolean
  custom?: boolean
  category?: string
  search?: string
}

const program = new Command()

program
  .name('notebook-workspace')
  .description('Manage spatial notebook workspaces and their metadata index')
  .version('1.0.0')
  .option('-r, --root <dir>', 'Workspace root directory (default: $NOTEBOOK_WORKSPACE_ROOT or cwd)')

function openStore(): WorkspaceMetadataStore {
  const { root } = program.opts<GlobalOptions>()
  const rootDirectory = root ?? process.env.NOTEBOOK_WORKSPACE_ROOT ?? process.cwd()
  return new WorkspaceMetadataStore({ rootDirectory })
}

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), describeError(error))
  process.exit(1)
}

function printWorkspace(record: WorkspaceMetadataRecord): void {
  const marker = record.isTemplate ? chalk.magenta(' [template]') : ''
  console.log(`${chalk.bold(record.name)}${marker}`)
  console.log(chalk.gray(`  id:       ${record.id}`))
  console.log(`  category: ${WORKSPACE_CATEGORY_LABELS[record.category]}`)
  console.log(`  windows:  ${record.totalWindows}${record.windowTypes.length ? ` (${record.windowTypes.join(', ')})` : ''}`)
  console.log(`  modified: ${format(record.modifiedDate, 'yyyy-MM-dd HH:mm')}`)
  if (record.tags.length > 0) {
    console.log(`  tags:     ${record.tags.join(', ')}`)
  }
  if (record.description) {
    console.log(chalk.gray(`  ${record.description}`))
  }
}

/**
 * List command - show indexed workspaces
 */
program
  .command('list')
  .description('List workspaces, most recently modified first')
  .option('-t, --templates', 'Only templates')
  .option('-c, --custom', 'Only non-template workspaces')
  .option('--category <category>', 'Only workspaces in this category')
  .option('-s, --search <query>', 'Match name, description or tags')
  .action(async (options: ListOptions) => {
    try {
      const store = openStore()
      await store.load()

      let records = options.search ? store.search(options.search) : store.list()
      if (options.templates) {
        const templateIds = new Set(store.listTemplates().map((record) => record.id))
        records = records.filter((record) => templateIds.has(record.id))
      } else if (options.custom) {
        records = records.filter((record) => !record.isTemplate)
      }
      if (options.category) {
        const category = parseWorkspaceCategory(options.category)
        records = records.filter((record) => record.category === category)
      }

      if (records.length === 0) {
        console.log(chalk.yellow('No workspaces found'))
        return
      }
      console.log(chalk.bold(`📂 ${records.length} workspace(s) in ${store.rootDirectory}\n`))
      records.forEach(printWorkspace)
    } catch (error) {
      fail(error)
    }
  })

/**
 * Refresh command - re-derive cached window counts
 */
program
  .command('refresh')
  .description('Re-read every workspace document and update cached window counts')
  .action(async () => {
    try {
      const store = openStore()
      await store.load()
      const updated = await store.refresh()
      console.log(chalk.green(`✅ Refreshed ${store.size} workspace(s), ${updated} updated`))
    } catch (error) {
      fail(error)
    }
  })

/**
 * Analyze command - summarize a notebook file
 */
program
  .command('analyze <file>')
  .description('Show cell and window statistics for a notebook file')
  .action(async (file: string) => {
    try {
      const analysis = analyzeNotebook(await fs.readFile(path.resolve(file), 'utf8'))
      console.log(chalk.bold(`🔍 ${path.basename(file)}\n`))
      console.log(`Total cells:      ${analysis.totalCells}`)
      console.log(`Window cells:     ${analysis.windowCells}`)
      console.log(`Window types:     ${analysis.windowTypes.join(', ') || '-'}`)
      console.log(`Export templates: ${analysis.exportTemplates.join(', ') || '-'}`)
      if (analysis.metadata) {
        console.log(`Exported:         ${analysis.metadata.export_date}`)
      }
      if (analysis.workspaceMetadata) {
        console.log(`Workspace:        ${analysis.workspaceMetadata.name} (${analysis.workspaceMetadata.category})`)
      }
    } catch (error) {
      fail(error)
    }
  })

/**
 * Validate command - exit status reflects validity
 */
program
  .command('validate <file>')
  .description('Check that a file is a window notebook')
  .action(async (file: string) => {
    try {
      const valid = validateNotebook(await fs.readFile(path.resolve(file), 'utf8'))
      if (valid) {
        console.log(chalk.green('✅ Valid window notebook'))
      } else {
        console.log(chalk.red('❌ Not a window notebook'))
      }
      process.exit(valid ? 0 : 1)
    } catch (error) {
      fail(error)
    }
  })

/**
 * Delete command - remove a workspace and its document
 */
program
  .command('delete <name>')
  .description('Delete a workspace by name')
  .action(async (name: string) => {
    try {
      const store = openStore()
      await store.load()
      const record = store.findByName(name)
      if (!record) {
        console.error(chalk.red(`Workspace not found: ${name}`))
        process.exit(1)
      }
      await store.deleteWorkspace(record.id)
      console.log(chalk.green(`🗑  Deleted "${record.name}"`))
    } catch (error) {
      fail(error)
    }
  })

program.parseAsync(process.argv).catch(fail)
