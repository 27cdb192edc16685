export { transformCustomerInfo } from "./customer-info.js";
export { transformProductInfo, deriveEndDates, categoryIdOf, productKeyOf } from "./product-info.js";
export { transformSalesDetails, repairSalesAmount, repairPrice, SALES_TOLERANCE } from "./sales-details.js";
export { transformCategories } from "./categories.js";
export { transformCustomerDemographics, stripLegacyPrefix } from "./customer-demographics.js";
export { transformLocations } from "./locations.js";
