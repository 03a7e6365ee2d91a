// Contract test suites

export { describeNameCacheContract, testIdentifier } from './nameCacheContract.js'
