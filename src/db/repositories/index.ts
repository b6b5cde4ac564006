export * from './queryable.js'
export * from './usersRepository.js'
export * from './subscriptionsRepository.js'
export * from './apiKeysRepository.js'
export * from './usageLogsRepository.js'
