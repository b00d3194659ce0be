export { SortedDict } from "./dict";
export {
  SortedDictItemsView,
  SortedDictKeysView,
  SortedDictValuesView,
} from "./views";
