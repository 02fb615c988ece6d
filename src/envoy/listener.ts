/**
 * Envoy listener filter builders.
 *
 * Filters are emitted in Envoy's JSON configuration format, with snake_case
 * keys exactly as the proxy expects them.
 */

/**
 * Cluster through which Envoy reaches the kenvoy management server.
 */
export const XDS_CLUSTER_NAME = 'kenvoy';

/**
 * A JSON value inside an untyped filter `config` block.
 */
export type ConfigValue = string | number | boolean | ConfigValue[] | { [key: string]: ConfigValue };

/**
 * A listener filter, run before the filter chain is selected.
 */
export interface ListenerFilter {
  name: string;
  config: { [key: string]: ConfigValue };
}

/**
 * A network filter inside a filter chain.
 */
export interface NetworkFilter {
  name: string;
  config: { [key: string]: ConfigValue };
}

/**
 * Returns a TLS inspector listener filter.
 */
export function tlsInspector(): ListenerFilter {
  return {
    name: 'envoy.listener.tls_inspector',
    config: {},
  };
}

/**
 * Returns an HTTP connection manager filter that fetches `routeName` over
 * RDS and writes its access log to `accessLogPath`.
 */
export function httpConnectionManager(routeName: string, accessLogPath: string): NetworkFilter {
  return {
    name: 'envoy.http_connection_manager',
    config: {
      stat_prefix: routeName,
      rds: {
        route_config_name: routeName,
        config_source: {
          api_config_source: {
            api_type: 'GRPC',
            grpc_services: [
              {
                envoy_grpc: {
                  cluster_name: XDS_CLUSTER_NAME,
                },
              },
            ],
          },
        },
      },
      http_filters: [
        { name: 'envoy.gzip' },
        { name: 'envoy.grpc_web' },
        { name: 'envoy.router' },
      ],
      use_remote_address: true,
      access_log: accessLog(accessLogPath),
    },
  };
}

function accessLog(path: string): ConfigValue {
  return [
    {
      name: 'envoy.file_access_log',
      config: {
        path,
      },
    },
  ];
}
