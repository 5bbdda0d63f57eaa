/**
 * @module plugins
 *
 * The plugins shipped with taskdeck. Collaborators a deployment swaps out
 * (task executor, package installer and index, turn generator) are passed
 * through to the plugin that owns them.
 */
import type { TaskdeckPlugin } from '../core/kernel/contracts.js';
import { createAgentsPlugin } from './agents/index.js';
import { createConversationsPlugin, type ConversationsPluginOptions } from './conversations/index.js';
import { createMemoryPlugin } from './memory/index.js';
import { createPackagesPlugin, type PackagesPluginOptions } from './packages/index.js';
import { createPreferencesPlugin } from './preferences/index.js';
import { createSystemPlugin } from './system/index.js';
import { createTasksPlugin, type TasksPluginOptions } from './tasks/index.js';
import { createThreadsPlugin } from './threads/index.js';
import { createToolsPlugin } from './tools/index.js';

export interface BundledPluginOptions {
  tasks?: TasksPluginOptions;
  packages?: PackagesPluginOptions;
  conversations?: ConversationsPluginOptions;
  startedAt?: Date;
}

export function bundledPlugins(options: BundledPluginOptions = {}): TaskdeckPlugin[] {
  return [
    createThreadsPlugin(),
    createMemoryPlugin(),
    createToolsPlugin(),
    createPreferencesPlugin(),
    createTasksPlugin(options.tasks),
    createPackagesPlugin(options.packages),
    createConversationsPlugin(options.conversations),
    createAgentsPlugin(),
    createSystemPlugin({ startedAt: options.startedAt }),
  ];
}
