export interface CommitRecord {
  id: string
  date: string // author time, local timezone, yyyy-MM-dd HH:mm:ss
  author: string
  message: string // subject line only
  changeId?: string
}

// Repository URL → last-seen commit id
export type WatermarkMap = Map<string, string>

// Repository URL → new commits this run, newest first, in config order
export type CommitAggregate = Map<string, CommitRecord[]>

export interface MonitorConfig {
  repos: string[]
  from: string
  to: string
  token: string
  templatePath?: string
  cacheDir?: string
  maxCommits?: number
  smtpHost: string
  smtpPort: number
  strictDelivery: boolean
  gitTimeoutMs: number
}

export type Destination =
  | { kind: 'file'; path: string }
  | {
      kind: 'email'
      from: string
      to: string
      token: string
      smtpHost: string
      smtpPort: number
    }

export interface RunSummary {
  checked: number
  updated: string[] // repos that yielded new commits
  failed: string[] // repos skipped on mirror or history errors
  delivered: boolean
  stateSaved: boolean
}
