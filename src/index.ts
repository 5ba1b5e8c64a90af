#!/usr/bin/env node

import { Command } from 'commander'
import { StillpointError } from './errors.js'
import {
  captureCommand,
  capturedCommand,
  transcribeCommand,
  transcriptCommand,
  failCommand,
  interruptCommand,
  importCommand,
  listCommand,
  showCommand,
  renameCommand,
  deleteCommand,
  reRedactCommand,
  dictionaryCommand,
  prefsCommand,
  learningCommand,
  patternsCommand,
  snapshotCommand,
  reflectCommand,
  stepsCommand,
  configCommand
} from './cli/commands.js'

const program = new Command()

program
  .name('stillpoint')
  .description('Local-first reflection journal: captures, redaction, learned preferences and contemplations')
  .version('0.1.0')

program
  .command('capture')
  .description('Start a capture Turn for an audio file and print its id')
  .argument('<audioPath>', 'Path to the audio file')
  .option('--context <context>', 'Capture context (unknown, handheld, handsfree, carplay, intent)')
  .option('--at <timestamp>', 'Recording start (ISO format)')
  .action(async (audioPath: string, options: { context?: string; at?: string }) => {
    await captureCommand(audioPath, options)
  })

program
  .command('captured')
  .description('Mark a capture as finished recording')
  .argument('<id>')
  .option('--bytes <n>', 'Audio size in bytes')
  .option('--at <timestamp>', 'Recording end (ISO format)')
  .action(async (id: string, options: { bytes?: string; at?: string }) => {
    await capturedCommand(id, options)
  })

program
  .command('transcribe')
  .description('Mark a Turn as transcribing')
  .argument('<id>')
  .option('--provider <provider>', 'Transcription provider (unknown, onDevice, server)')
  .option('--locale <locale>', 'Transcription locale, e.g. en-GB')
  .action(async (id: string, options: { provider?: string; locale?: string }) => {
    await transcribeCommand(id, options)
  })

program
  .command('transcript')
  .description('Deliver the raw transcript: redacts it, marks the Turn ready and learns from it')
  .argument('<id>')
  .argument('[text...]')
  .option('--file <path>', 'Read the transcript from a file')
  .action(async (id: string, text: string[], options: { file?: string }) => {
    await transcriptCommand(id, text, options)
  })

program
  .command('fail')
  .description('Mark a Turn as failed')
  .argument('<id>')
  .argument('<message>')
  .action(async (id: string, message: string) => {
    await failCommand(id, message)
  })

program
  .command('interrupt')
  .description('Mark a Turn as interrupted')
  .argument('<id>')
  .action(async (id: string) => {
    await interruptCommand(id)
  })

program
  .command('import')
  .description('Import text as a ready Turn. The text is redacted before it is stored')
  .argument('[text...]')
  .option('--file <path>', 'Read the text from a file')
  .option('--context <context>', 'Capture context')
  .option('--at <timestamp>', 'Recorded at (ISO format)')
  .action(async (text: string[], options: { file?: string; context?: string; at?: string }) => {
    await importCommand(text, options)
  })

program
  .command('list')
  .description('List Turns, newest first')
  .option('--state <state>', 'Only Turns in this state')
  .option('--limit <n>', 'Maximum number of Turns')
  .option('--unfinished', 'Only Turns left mid-pipeline, oldest first')
  .action(async (options: { state?: string; limit?: string; unfinished?: boolean }) => {
    await listCommand(options)
  })

program
  .command('show')
  .description('Show one Turn')
  .argument('<id>')
  .option('--raw', 'Include the local raw transcript')
  .option('--history', 'Include redaction history')
  .action(async (id: string, options: { raw?: boolean; history?: boolean }) => {
    await showCommand(id, options)
  })

program
  .command('rename')
  .description('Set a Turn title')
  .argument('<id>')
  .argument('<title>')
  .action(async (id: string, title: string) => {
    await renameCommand(id, title)
  })

program
  .command('delete')
  .description('Delete a Turn and its audio')
  .argument('<id>')
  .action(async (id: string) => {
    await deleteCommand(id)
  })

program
  .command('redact')
  .description('Re-apply the redaction dictionary to a Turn')
  .argument('<id>')
  .action(async (id: string) => {
    await reRedactCommand(id)
  })

program
  .command('dict')
  .description('Manage the redaction dictionary')
  .argument('[action]', 'list, add, remove or wipe')
  .argument('[token]')
  .action(async (action?: string, token?: string) => {
    await dictionaryCommand(action, token)
  })

program
  .command('prefs')
  .description('Manage capsule preferences')
  .argument('[action]', 'list, set, remove or wipe')
  .argument('[key]')
  .argument('[value]')
  .action(async (action?: string, key?: string, value?: string) => {
    await prefsCommand(action, key, value)
  })

program
  .command('learning')
  .description('Show or change learning')
  .argument('[action]', 'status, on, off or reset')
  .action(async (action?: string) => {
    await learningCommand(action)
  })

program
  .command('patterns')
  .description('Show the strongest learned patterns')
  .option('--kind <kind>', 'Only this pattern kind')
  .option('--limit <n>', 'Maximum number of patterns')
  .action(async (options: { kind?: string; limit?: string }) => {
    await patternsCommand(options)
  })

program
  .command('snapshot')
  .description('Preview the capsule snapshot that is sent with a request')
  .option('--mode <mode>', 'reflect or talk')
  .action(async (options: { mode?: string }) => {
    await snapshotCommand(options)
  })

program
  .command('reflect')
  .description('Run a contemplation mode for a Turn')
  .argument('<id>')
  .option('--mode <mode>', 'reflect, perspective, options, questions or talkItThrough')
  .option('--fallback', 'Use seed content when the remote call fails')
  .action(async (id: string, options: { mode?: string; fallback?: boolean }) => {
    await reflectCommand(id, options)
  })

program
  .command('steps')
  .description('Fetch a programme of steps')
  .argument('<kind>', 'reflect, focus or practice')
  .option('--programme <slug>', 'Programme slug')
  .option('--fallback', 'Use the built-in list when the remote call fails')
  .action(async (kind: string, options: { programme?: string; fallback?: boolean }) => {
    await stepsCommand(kind, options)
  })

program
  .command('config')
  .description('Show config, or set a value by dotted key')
  .argument('[action]', 'set')
  .argument('[key]')
  .argument('[value]')
  .action(async (action?: string, key?: string, value?: string) => {
    await configCommand(action, key, value)
  })

program.parseAsync(process.argv).catch((err) => {
  if (err instanceof StillpointError) {
    console.error(`Error: ${err.message}`)
  } else {
    console.error(err)
  }
  process.exit(1)
})
