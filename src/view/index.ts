export { ChangeNotifier, IDLE, LOADING, LOADING_MORE, SUCCESS, errorState } from "./view-state.js";
export type { StateListener, ViewState, ViewStatus } from "./view-state.js";
export { ListViewModel, createUserListViewModel } from "./list-view-model.js";
export type { ListViewModelOptions, SearchFields } from "./list-view-model.js";
export { PagedListViewModel } from "./paged-list-view-model.js";
export type { PagedListViewModelOptions } from "./paged-list-view-model.js";
export { DetailViewModel } from "./detail-view-model.js";
