export const validConfig = `services {
  "edge" {
    listeners {
      "0.0.0.0:80"
    }
    connectors {
      upstream "10.0.0.2:8080"
    }
  }
}
`

export const invalidConfig = `service "edge"\n`
