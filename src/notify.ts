import { mkdirSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import nodemailer from 'nodemailer'
import { mailboxAddress } from './config.js'
import type { Logger } from './log.js'
import type { Destination } from './types.js'

export const EMAIL_SUBJECT = 'Git Commit Notification'

type EmailDestination = Extract<Destination, { kind: 'email' }>

async function sendEmail(html: string, dest: EmailDestination): Promise<void> {
  const transport = nodemailer.createTransport({
    host: dest.smtpHost,
    port: dest.smtpPort,
    secure: dest.smtpPort === 465, // other ports upgrade via STARTTLS
    auth: { user: mailboxAddress(dest.from), pass: dest.token },
  })
  try {
    await transport.sendMail({
      from: dest.from,
      to: dest.to,
      subject: EMAIL_SUBJECT,
      html,
    })
  } finally {
    transport.close()
  }
}

// Errors propagate; the caller decides what a failed delivery means for state.
export async function deliver(html: string, dest: Destination, log: Logger): Promise<void> {
  if (dest.kind === 'file') {
    mkdirSync(dirname(dest.path), { recursive: true })
    writeFileSync(dest.path, html, 'utf-8')
    log.info(`  ✓ Report written to ${dest.path}`)
    return
  }

  await sendEmail(html, dest)
  log.info(`  ✓ Email sent to ${dest.to}`)
}
