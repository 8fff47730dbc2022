import type { FileSet } from './check.js'

export interface Attachment {
  name: string
  /** data:mime/type;base64,... */
  url: string
}

/** Inbound build request; checks are normalized to a list at intake */
export interface BuildTask {
  email: string
  task: string
  round: number
  nonce: string
  brief: string
  checks: string[]
  evaluationUrl: string
  attachments: Attachment[]
}

export interface Deployment {
  repoUrl: string
  commitSha: string
  /** null when the publisher produced no public URL */
  pagesUrl: string | null
}

/** External code generator; throws AppError.generation on provider or quota faults */
export interface Generator {
  generate(task: BuildTask): Promise<FileSet>
}

/** External repository publisher; throws AppError.publish on failure */
export interface Publisher {
  publish(task: BuildTask, files: FileSet): Promise<Deployment>
}
