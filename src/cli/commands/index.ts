export { reportCommand } from './report.js'
export { summaryCommand } from './summary.js'
export { generateCommand } from './generate.js'
export { initCommand } from './init.js'
