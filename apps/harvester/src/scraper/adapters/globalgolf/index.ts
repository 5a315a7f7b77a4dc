export { globalGolfAdapter, extractCategoryPage, extractDetailPage } from './adapter.js'
