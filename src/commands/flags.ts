export const sharedFlags = {
  profile: {
    type: String,
    alias: 'p',
    description: 'JSON file overriding the save format profile'
  },
  backupDir: {
    type: String,
    alias: 'b',
    description: 'Directory for backups (default: <save>.backups)'
  },
  keep: {
    type: Number,
    alias: 'k',
    description: 'Keep only the latest N backups (default: keep all)'
  }
}

export const slotFlags = {
  slot: {
    type: Number,
    alias: 's',
    description: 'Character slot, 1-10',
    default: 1
  }
}

export const catalogFlags = {
  catalog: {
    type: String,
    alias: 'c',
    description: 'JSON flag catalog with names and categories'
  }
}
