export type ComposeSpec = {
  services: Record<string, ComposeService>;
  /** Named volumes; a null entry takes the runtime's defaults. */
  volumes: Record<string, null>;
};

export type ComposeService = {
  container_name: string;
  image: string;
  restart: string;
  command?: string;
  depends_on?: string[];
  /** KEY=value entries. */
  environment?: string[];
  ports?: string[];
  volumes?: string[];
};
