export { Header } from "./Header.tsx";
export { UploadProgress, type UploadStatus } from "./UploadProgress.tsx";
export { ConnectionStatus, type ConnectionStep } from "./ConnectionStatus.tsx";
export { TransferSummary } from "./TransferSummary.tsx";
export { App } from "./App.tsx";
export { DeviceListApp } from "./DeviceListApp.tsx";
