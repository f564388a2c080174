/**
 * HTML report
 *
 * One section per repository with new commits, in aggregate order. The
 * tables are either dropped into a user template at `{{tables}}` or wrapped
 * in a minimal standalone page.
 */

import { readFileSync } from 'fs'
import { commitLink } from './links.js'
import type { CommitAggregate, CommitRecord } from './types.js'

export const TABLES_PLACEHOLDER = '{{tables}}'

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

function renderIdCell(repoUrl: string, commit: CommitRecord): string {
  const link = commitLink(repoUrl, commit)
  return link ? `<a href="${escapeHtml(link)}">${commit.id}</a>` : commit.id
}

export function renderTables(aggregate: CommitAggregate): string {
  let tables = ''
  for (const [repoUrl, commits] of aggregate) {
    if (commits.length === 0) continue
    tables +=
      `<h2>Repository: ${escapeHtml(repoUrl)}</h2>` +
      '<table border="1"><tr><th>ID</th><th>Date</th><th>Author</th><th>Message</th></tr>'
    for (const c of commits) {
      tables +=
        `<tr><td>${renderIdCell(repoUrl, c)}</td><td>${c.date}</td>` +
        `<td>${escapeHtml(c.author)}</td><td>${escapeHtml(c.message)}</td></tr>`
    }
    tables += '</table>'
  }
  return tables
}

function readTemplate(path: string): string | null {
  try {
    return readFileSync(path, 'utf-8')
  } catch {
    return null
  }
}

export function renderReport(aggregate: CommitAggregate, templatePath?: string): string {
  const tables = renderTables(aggregate)

  // Unreadable template falls back to the built-in page without a warning
  const template = templatePath ? readTemplate(templatePath) : null
  if (template !== null) {
    return template.split(TABLES_PLACEHOLDER).join(tables)
  }

  return `<html><body><h1>Git Commit Report</h1>${tables}</body></html>`
}
