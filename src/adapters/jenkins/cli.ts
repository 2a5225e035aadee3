#!/usr/bin/env node
/**
 * @entry checkpulse-jenkins
 *
 *   checkpulse-jenkins <jenkinsBaseUrl> <jobName> [--root-api] [--pretty-api]
 */

import { createJenkinsProgram } from './command.js'

await createJenkinsProgram().parseAsync()
