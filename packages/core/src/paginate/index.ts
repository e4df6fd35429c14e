export { PageView, ResultPaginator } from "./paginator.js";
