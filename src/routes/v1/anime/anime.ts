import { createCatalogRoutes } from '@utils/catalog-routes.js'

export default createCatalogRoutes('anime')
