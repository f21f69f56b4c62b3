export { info } from './info'
export { validate } from './validate'
export { get } from './get'
export { set } from './set'
export { unlock } from './unlock'
export { fixChecksums } from './fix-checksums'
export { backups } from './backups'
export { restore } from './restore'
export { search } from './search'
